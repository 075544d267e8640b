/**
 * Configuration Manager
 *
 * YAML-based configuration with:
 * - Environment variable substitution (${VAR} and ${VAR:-default})
 * - ROLEGRAPH_* environment overrides
 * - Schema validation and default values
 */

import * as fs from 'fs';
import * as yaml from 'yaml';
import { RbacConfigSchema, ENV_OVERRIDES, type RbacConfig } from './types.js';
import { ConfigLoadError, ConfigValidationError } from './errors.js';

export interface ConfigManagerOptions {
  configPath?: string;
  /** Defaults to process.env */
  env?: NodeJS.ProcessEnv;
  /** Searched in order when no configPath is given */
  searchPaths?: string[];
}

// Default search paths for configuration files
const DEFAULT_SEARCH_PATHS = ['./rolegraph.yaml', '/etc/rolegraph/config.yaml'];

type ConfigTree = Record<string, unknown>;

function isTree(value: unknown): value is ConfigTree {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class ConfigManager {
  private config: RbacConfig | null = null;
  private readonly env: NodeJS.ProcessEnv;

  constructor(private readonly options: ConfigManagerOptions = {}) {
    this.env = options.env ?? process.env;
  }

  async load(): Promise<RbacConfig> {
    let raw: ConfigTree = {};

    const configPath = this.options.configPath ?? this.findConfigFile();
    if (this.options.configPath && !fs.existsSync(this.options.configPath)) {
      throw new ConfigLoadError(`Config file not found: ${this.options.configPath}`);
    }
    if (configPath) {
      const substituted = this.substituteEnvVars(this.parseYaml(this.loadFile(configPath)));
      raw = isTree(substituted) ? this.convertTypes(substituted) : {};
    }

    this.applyEnvOverrides(raw);
    this.config = validateConfig(raw);
    return this.get();
  }

  get(): RbacConfig {
    if (!this.config) {
      throw new ConfigLoadError('Configuration not loaded. Call load() first.');
    }
    return structuredClone(this.config);
  }

  private findConfigFile(): string | null {
    for (const searchPath of this.options.searchPaths ?? DEFAULT_SEARCH_PATHS) {
      if (fs.existsSync(searchPath)) {
        return searchPath;
      }
    }
    return null;
  }

  private loadFile(path: string): string {
    try {
      return fs.readFileSync(path, 'utf8');
    } catch (e) {
      throw new ConfigLoadError(`Failed to read config file: ${path}`, e instanceof Error ? e : undefined);
    }
  }

  private parseYaml(content: string): unknown {
    try {
      return yaml.parse(content) ?? {};
    } catch (e) {
      throw new ConfigLoadError('Invalid YAML syntax', e instanceof Error ? e : undefined);
    }
  }

  private substituteEnvVars(value: unknown): unknown {
    if (typeof value === 'string') {
      // Match ${VAR} or ${VAR:-default}
      return value.replace(/\$\{(\w+)(?::-([^}]*))?\}/g, (_match, name: string, defaultVal: string | undefined) => {
        const envValue = this.env[name];

        // An empty variable counts as unset when a default is given
        if ((envValue === undefined || envValue === '') && defaultVal !== undefined) {
          return defaultVal;
        }
        if (envValue === undefined) {
          throw new ConfigLoadError(`Required environment variable '${name}' not set`);
        }
        return envValue;
      });
    }
    if (Array.isArray(value)) {
      return value.map((v) => this.substituteEnvVars(v));
    }
    if (isTree(value)) {
      return Object.fromEntries(Object.entries(value).map(([k, v]) => [k, this.substituteEnvVars(v)]));
    }
    return value;
  }

  private convertTypes(tree: ConfigTree): ConfigTree {
    const result: ConfigTree = {};
    for (const [key, value] of Object.entries(tree)) {
      result[key] = isTree(value) ? this.convertTypes(value) : this.convertScalar(value);
    }
    return result;
  }

  private convertScalar(value: unknown): unknown {
    if (typeof value !== 'string') return value;
    if (/^\d+$/.test(value)) return parseInt(value, 10);
    if (value === 'true') return true;
    if (value === 'false') return false;
    return value;
  }

  private applyEnvOverrides(raw: ConfigTree): void {
    for (const [envName, path] of Object.entries(ENV_OVERRIDES)) {
      const value = this.env[envName];
      if (value === undefined || value === '') continue;

      const segments = path.split('.');
      const leaf = segments.pop();
      if (!leaf) continue;

      let node = raw;
      for (const segment of segments) {
        const child = node[segment];
        if (isTree(child)) {
          node = child;
        } else {
          const created: ConfigTree = {};
          node[segment] = created;
          node = created;
        }
      }
      node[leaf] = this.convertScalar(value);
    }
  }
}

/**
 * Validate a raw configuration tree and apply defaults.
 *
 * @throws ConfigValidationError naming the first offending field
 */
export function validateConfig(raw: unknown): RbacConfig {
  const result = RbacConfigSchema.safeParse(raw);
  if (result.success) {
    return result.data;
  }

  const [issue] = result.error.issues;
  const field = issue.path.join('.');
  let value: unknown = raw;
  for (const segment of issue.path) {
    value = isTree(value) ? value[String(segment)] : undefined;
  }

  const message = issue.code === 'unrecognized_keys'
    ? `Unknown configuration key: '${[field, ...issue.keys].filter(Boolean).join('.')}'`
    : `Invalid value for ${field || 'config'}: ${issue.message}`;
  throw new ConfigValidationError(message, field, value);
}

/**
 * Load configuration in one call.
 */
export async function loadConfig(options: ConfigManagerOptions = {}): Promise<RbacConfig> {
  return new ConfigManager(options).load();
}
