import { describe, it, expect, beforeEach } from 'vitest';
import { PluginRegistry } from '../core/plugin-registry.js';
import { CircularDependencyError, ConfigurationError, MissingDependencyError } from '../errors.js';
import { echoTranslator, observer, tracingMiddleware } from './helpers/plugins.js';

describe('PluginRegistry', () => {
  let registry: PluginRegistry;

  beforeEach(() => {
    registry = new PluginRegistry();
  });

  it('should order a dependency chain with dependencies first', () => {
    registry.register(observer('c', ['b'])).register(observer('b', ['a'])).register(observer('a'));

    expect(registry.resolveOrder().map((plugin) => plugin.name)).toEqual(['a', 'b', 'c']);
  });

  it('should keep registration order for unrelated plugins', () => {
    registry.register(observer('x')).register(observer('y')).register(observer('z'));

    expect(registry.resolveOrder().map((plugin) => plugin.name)).toEqual(['x', 'y', 'z']);
  });

  it('should report the cycle path', () => {
    registry.register(observer('a', ['b'])).register(observer('b', ['c'])).register(observer('c', ['b']));

    expect(() => registry.resolveOrder()).toThrow(CircularDependencyError);
    expect(() => registry.resolveOrder()).toThrow('Circular dependency detected: b -> c -> b');
  });

  it('should report a missing dependency', () => {
    registry.register(observer('a', ['ghost']));

    expect(() => registry.resolveOrder()).toThrow(MissingDependencyError);
    expect(() => registry.resolveOrder()).toThrow("Plugin 'a' depends on 'ghost' which is not registered");
  });

  it('should refuse a second plugin with the same name', () => {
    registry.register(observer('a'));
    expect(() => registry.register(observer('a'))).toThrow("Plugin 'a' is already registered");
  });

  it('should switch plugins per tenant without touching other tenants', () => {
    registry.register(observer('a'));
    registry.disableForTenant('acme', 'a');

    expect(registry.isEnabledFor('a', 'acme')).toBe(false);
    expect(registry.isEnabledFor('a', 'globex')).toBe(true);
    expect(registry.isEnabledFor('a')).toBe(true);
    expect(registry.isEnabledFor('unknown')).toBe(false);
  });

  it('should keep tenant overrides when a plugin is disabled and return copies', () => {
    registry.register(observer('a'));
    registry.enableForTenant('acme', 'a', { strictMode: true });

    const overrides = registry.overridesFor('a', 'acme');
    expect(overrides).toEqual({ strictMode: true });
    if (overrides) overrides.strictMode = false;
    expect(registry.overridesFor('a', 'acme')).toEqual({ strictMode: true });

    registry.disableForTenant('acme', 'a');
    expect(registry.overridesFor('a', 'acme')).toEqual({ strictMode: true });
    expect(registry.overridesFor('a')).toBeUndefined();
  });

  it('should reject tenant settings for unregistered plugins', () => {
    expect(() => registry.enableForTenant('acme', 'ghost')).toThrow(ConfigurationError);
  });

  it('should describe the graph and statistics', () => {
    registry
      .register(observer('a'))
      .register(observer('b', ['a']))
      .register(tracingMiddleware('m', 'validation', 0, []))
      .register(echoTranslator());
    registry.disableForTenant('acme', 'a');

    expect(registry.getDependencyGraph()).toEqual({ a: [], b: ['a'], m: [], echo: [] });
    expect(registry.getStatistics()).toEqual({
      total: 4,
      byKind: { middleware: 1, provider: 1, observer: 2 },
      tenants: 1,
    });
    expect(registry.ofKind('middleware').map((plugin) => plugin.name)).toEqual(['m']);
  });
});
