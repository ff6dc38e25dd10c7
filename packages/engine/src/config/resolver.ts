import type { z } from 'zod';
import type { ILogger } from '../shared/types.js';
import { ConfigError, type ConfigScope } from '../shared/errors.js';
import { createConsoleLogger } from '../shared/logger.js';
import { CONFIG_KEYS, type ConfigKeyName, type MultiKeyDefinition, type SingleKeyDefinition, type WorkonSettings } from './keys.js';
import { STORE_SCOPES, type ConfigStore } from './store.js';

/** Values given on the command line. They outrank every stored scope. */
export type ConfigOverrides = Partial<Record<ConfigKeyName, string | readonly string[]>>;

export interface ResolvedValue<T> {
  value: T;
  source: ConfigScope;
}

export interface ConfigResolverOptions {
  overrides?: ConfigOverrides;
  logger?: ILogger;
}

/**
 * Layered configuration: CLI override, then local, then global, then the
 * built-in default. Build one per invocation; nothing is cached between them.
 */
export class ConfigResolver {
  private readonly overrides: ConfigOverrides;
  private readonly logger: ILogger;

  constructor(
    private readonly store: ConfigStore,
    options: ConfigResolverOptions = {},
  ) {
    this.overrides = options.overrides ?? {};
    this.logger = options.logger ?? createConsoleLogger('config');
  }

  async resolve<S extends z.ZodTypeAny, D>(definition: SingleKeyDefinition<S, D>): Promise<ResolvedValue<z.output<S> | D>> {
    const found = await this.findSingle(definition.key);
    if (!found) {
      return { value: definition.defaultValue, source: 'default' };
    }

    const parsed = definition.schema.safeParse(found.value);
    if (!parsed.success) {
      throw new ConfigError(definition.key, found.source, found.value, firstIssue(parsed.error));
    }
    this.logger.debug(`${definition.key} resolved from ${found.source} scope`);
    return { value: parsed.data, source: found.source };
  }

  /** Multi-valued keys are never merged: the first scope that defines any value wins. */
  async resolveMulti(definition: MultiKeyDefinition): Promise<ResolvedValue<string[]>> {
    const found = await this.findMulti(definition.key);
    if (!found) {
      return { value: [], source: 'default' };
    }

    const values: string[] = [];
    for (const raw of found.value) {
      const parsed = definition.itemSchema.safeParse(raw);
      if (!parsed.success) {
        throw new ConfigError(definition.key, found.source, raw, firstIssue(parsed.error));
      }
      values.push(parsed.data);
    }
    this.logger.debug(`${definition.key} resolved from ${found.source} scope`, { count: values.length });
    return { value: values, source: found.source };
  }

  async resolveAll(): Promise<WorkonSettings> {
    return {
      defaultBranch: (await this.resolve(CONFIG_KEYS.defaultBranch)).value,
      postCreateHooks: (await this.resolveMulti(CONFIG_KEYS.postCreateHooks)).value,
      copyPatterns: (await this.resolveMulti(CONFIG_KEYS.copyPatterns)).value,
      copyExcludes: (await this.resolveMulti(CONFIG_KEYS.copyExcludes)).value,
      autoCopyUntracked: (await this.resolve(CONFIG_KEYS.autoCopyUntracked)).value,
      protectedPatterns: (await this.resolveMulti(CONFIG_KEYS.protectedPatterns)).value,
      prFormat: (await this.resolve(CONFIG_KEYS.prFormat)).value,
      hookTimeoutSeconds: (await this.resolve(CONFIG_KEYS.hookTimeoutSeconds)).value,
    };
  }

  private async findSingle(key: ConfigKeyName): Promise<ResolvedValue<string> | undefined> {
    const override = this.overrideFor(key);
    if (override !== undefined) {
      const value = typeof override === 'string' ? override : override.at(-1);
      if (value !== undefined) {
        return { value, source: 'cli' };
      }
    }

    for (const scope of STORE_SCOPES) {
      const value = await this.store.getScoped(key, scope);
      if (value !== undefined) {
        return { value, source: scope };
      }
    }
    return undefined;
  }

  private async findMulti(key: ConfigKeyName): Promise<ResolvedValue<string[]> | undefined> {
    const override = this.overrideFor(key);
    if (override !== undefined) {
      const values = typeof override === 'string' ? [override] : [...override];
      if (values.length > 0) {
        return { value: values, source: 'cli' };
      }
    }

    for (const scope of STORE_SCOPES) {
      const values = await this.store.getAllScoped(key, scope);
      if (values.length > 0) {
        return { value: values, source: scope };
      }
    }
    return undefined;
  }

  private overrideFor(key: ConfigKeyName): string | readonly string[] | undefined {
    return this.overrides[key];
  }
}

function firstIssue(error: z.ZodError): string {
  return error.issues[0]?.message ?? 'invalid value';
}
