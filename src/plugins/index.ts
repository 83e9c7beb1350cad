/**
 * flowbind – Plugins
 *
 * A plugin is a function from Registry to Registry, usually adding a group
 * of related template functions. Registries are immutable, so plugins
 * compose by plain function application:
 *
 *   const stringsPlugin: Plugin = (registry) =>
 *     registry
 *       .withFunction('upper', ([v]) => stringValue(asString(v).toUpperCase()))
 *       .withFunction('lower', ([v]) => stringValue(asString(v).toLowerCase()));
 *
 *   const registry = applyPlugins(createRegistry(), stringsPlugin);
 *   const template = parseWithFunctions('{{ $input.name | upper }}', registry);
 *
 * License: Apache-2.0
 */

import type { Registry } from '../core/registry';
import { createServiceLogger } from '../logging/logger';

const logger = createServiceLogger('registry');

/////////////////////////////
// Plugin composition types
/////////////////////////////

export type Plugin = (registry: Registry) => Registry;

/**
 * A plugin that takes configuration first:
 *
 *   const prefixed: ConfigurablePlugin<{ prefix: string }> =
 *     ({ prefix }) => (registry) => registry.withFunction(`${prefix}now`, now);
 */
export type ConfigurablePlugin<Options = unknown> = (
  options: Options,
) => Plugin;

/////////////////////////////
// Helper: applyPlugins    //
/////////////////////////////

/**
 * Apply plugins left to right: registry' = pN(...(p2(p1(registry)))).
 */
export function applyPlugins(registry: Registry, ...plugins: Plugin[]): Registry {
  return plugins.reduce((current, plugin) => plugin(current), registry);
}

/////////////////////////////
// Helper: createPluginSet //
/////////////////////////////

export interface PluginSet {
  /**
   * Used in debug logs.
   */
  readonly name: string;

  readonly plugins: readonly Plugin[];

  /**
   * Same as `applyPlugins(registry, ...plugins)`.
   */
  attach(registry: Registry): Registry;
}

/**
 * Bundle plugins under a name for reuse across workflows.
 */
export function createPluginSet(name: string, ...plugins: Plugin[]): PluginSet {
  const frozenPlugins = Object.freeze([...plugins]);

  return {
    name,
    plugins: frozenPlugins,
    attach(registry: Registry): Registry {
      const result = applyPlugins(registry, ...frozenPlugins);
      logger.debug('plugin set attached', {
        pluginSet: name,
        added: result.size - registry.size,
      });
      return result;
    },
  };
}
