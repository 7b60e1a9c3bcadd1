import {
  CircularDependencyError,
  ConfigurationError,
  MissingDependencyError,
} from '../errors.js';
import type { PluginKind, TranslationPlugin } from '../plugins/types.js';

interface TenantPluginState {
  enabled: boolean;
  overrides: Record<string, unknown>;
}

export interface PluginStatistics {
  total: number;
  byKind: Record<PluginKind, number>;
  tenants: number;
}

/**
 * Named plugins plus per-tenant switches and overrides. Tenant state lives
 * beside the plugins and never touches a registered instance.
 */
export class PluginRegistry {
  private readonly plugins = new Map<string, TranslationPlugin>();
  private readonly tenants = new Map<string, Map<string, TenantPluginState>>();

  register(plugin: TranslationPlugin): this {
    if (this.plugins.has(plugin.name)) {
      throw new ConfigurationError(`Plugin '${plugin.name}' is already registered`);
    }
    this.plugins.set(plugin.name, plugin);
    return this;
  }

  get(name: string): TranslationPlugin | undefined {
    return this.plugins.get(name);
  }

  has(name: string): boolean {
    return this.plugins.has(name);
  }

  all(): TranslationPlugin[] {
    return [...this.plugins.values()];
  }

  ofKind<K extends PluginKind>(kind: K): Extract<TranslationPlugin, { kind: K }>[] {
    return this.all().filter((plugin): plugin is Extract<TranslationPlugin, { kind: K }> => plugin.kind === kind);
  }

  /**
   * Orders plugins so every dependency comes before its dependents.
   * Unrelated plugins keep their registration order.
   */
  resolveOrder(): TranslationPlugin[] {
    const ordered: TranslationPlugin[] = [];
    const visited = new Set<string>();
    const path: string[] = [];

    const visit = (plugin: TranslationPlugin): void => {
      if (visited.has(plugin.name)) return;

      const start = path.indexOf(plugin.name);
      if (start !== -1) {
        throw new CircularDependencyError([...path.slice(start), plugin.name]);
      }

      path.push(plugin.name);
      for (const dependency of plugin.dependencies) {
        const target = this.plugins.get(dependency);
        if (!target) {
          throw new MissingDependencyError(plugin.name, dependency);
        }
        visit(target);
      }
      path.pop();

      visited.add(plugin.name);
      ordered.push(plugin);
    };

    for (const plugin of this.plugins.values()) {
      visit(plugin);
    }
    return ordered;
  }

  enableForTenant(tenantId: string, name: string, overrides: Record<string, unknown> = {}): this {
    this.requirePlugin(name);
    this.tenantPlugins(tenantId).set(name, { enabled: true, overrides: { ...overrides } });
    return this;
  }

  disableForTenant(tenantId: string, name: string): this {
    this.requirePlugin(name);
    const states = this.tenantPlugins(tenantId);
    states.set(name, { enabled: false, overrides: states.get(name)?.overrides ?? {} });
    return this;
  }

  isEnabledFor(name: string, tenantId?: string): boolean {
    if (!this.plugins.has(name)) return false;
    if (tenantId === undefined) return true;
    return this.tenants.get(tenantId)?.get(name)?.enabled ?? true;
  }

  overridesFor(name: string, tenantId?: string): Record<string, unknown> | undefined {
    if (tenantId === undefined) return undefined;
    const overrides = this.tenants.get(tenantId)?.get(name)?.overrides;
    return overrides && Object.keys(overrides).length > 0 ? { ...overrides } : undefined;
  }

  getDependencyGraph(): Record<string, string[]> {
    const graph: Record<string, string[]> = {};
    for (const plugin of this.plugins.values()) {
      graph[plugin.name] = [...plugin.dependencies];
    }
    return graph;
  }

  getStatistics(): PluginStatistics {
    const byKind: Record<PluginKind, number> = { middleware: 0, provider: 0, observer: 0 };
    for (const plugin of this.plugins.values()) {
      byKind[plugin.kind]++;
    }
    return { total: this.plugins.size, byKind, tenants: this.tenants.size };
  }

  private requirePlugin(name: string): void {
    if (!this.plugins.has(name)) {
      throw new ConfigurationError(`Plugin '${name}' is not registered`);
    }
  }

  private tenantPlugins(tenantId: string): Map<string, TenantPluginState> {
    let states = this.tenants.get(tenantId);
    if (!states) {
      states = new Map();
      this.tenants.set(tenantId, states);
    }
    return states;
  }
}
