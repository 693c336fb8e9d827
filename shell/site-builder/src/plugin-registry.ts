import type { SiteConfig } from "@folio/config";
import { Logger, SiteBuildError } from "@folio/utils";
import type { SitePlugin } from "./types";

export interface PluginSelection {
  /** Plugins to run, in registration order */
  enabled: SitePlugin[];
  /** Names listed under `plugins` that no registered plugin answers to */
  unknown: string[];
  /** Plugins listed under `plugins` but left out by safe mode */
  blocked: SitePlugin[];
}

/**
 * Registry of generator plugins, looked up by name or alias
 */
export class PluginRegistry {
  private readonly plugins: SitePlugin[] = [];
  private readonly byName = new Map<string, SitePlugin>();
  private readonly logger: Logger;

  public static createFresh(
    logger: Logger = Logger.getInstance(),
    plugins: readonly SitePlugin[] = [],
  ): PluginRegistry {
    const registry = new PluginRegistry(logger);
    for (const plugin of plugins) {
      registry.register(plugin);
    }
    return registry;
  }

  private constructor(logger: Logger) {
    this.logger = logger.child("PluginRegistry");
  }

  /**
   * @throws SiteBuildError when the name or an alias is taken
   */
  register(plugin: SitePlugin): this {
    for (const name of [plugin.name, ...plugin.aliases]) {
      const existing = this.byName.get(name);
      if (existing) {
        throw new SiteBuildError(
          `Plugin name "${name}" of ${plugin.name} is already registered by ${existing.name}`,
          { plugin: plugin.name, name },
        );
      }
    }

    for (const name of [plugin.name, ...plugin.aliases]) {
      this.byName.set(name, plugin);
    }
    this.plugins.push(plugin);
    this.logger.debug(`Registered plugin ${plugin.name}`);
    return this;
  }

  get(name: string): SitePlugin | undefined {
    return this.byName.get(name);
  }

  list(): SitePlugin[] {
    return [...this.plugins];
  }

  /**
   * Plugins enabled by `plugins`; under `safe` a plugin runs only when
   * one of its names is also whitelisted
   */
  select(config: SiteConfig): PluginSelection {
    const requested = new Set<SitePlugin>();
    const unknown: string[] = [];

    for (const name of config.plugins) {
      const plugin = this.byName.get(name);
      if (plugin) {
        requested.add(plugin);
      } else if (!unknown.includes(name)) {
        unknown.push(name);
      }
    }

    const whitelisted = (plugin: SitePlugin): boolean =>
      [plugin.name, ...plugin.aliases].some((name) =>
        config.whitelist.includes(name),
      );

    const enabled: SitePlugin[] = [];
    const blocked: SitePlugin[] = [];
    for (const plugin of this.plugins) {
      if (!requested.has(plugin)) {
        continue;
      }
      if (config.safe && !whitelisted(plugin)) {
        blocked.push(plugin);
      } else {
        enabled.push(plugin);
      }
    }

    return { enabled, unknown, blocked };
  }
}
