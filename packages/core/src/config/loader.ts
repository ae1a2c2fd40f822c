import fs from 'fs';
import path from 'path';
import yaml from 'js-yaml';
import { ConfigError, HarnessConfigSchema } from '@repairbench/shared';
import type { HarnessConfig, HarnessConfigInput } from '@repairbench/shared';

export const DEFAULT_CONFIG_FILE = '.repairbench.yaml';

export interface ConfigOptions {
  configPath?: string; // --config
  flags?: HarnessConfigInput; // CLI flags
  cwd?: string; // where to look for .repairbench.yaml
}

type ConfigLayer = Record<string, unknown>;

function isRecord(value: unknown): value is ConfigLayer {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

const PATH_KEYS = ['corpus', 'report', 'events'] as const;
const STRATEGY_PATH_KEYS = ['dir', 'cwd'] as const;

export class ConfigLoader {
  static loadYaml(filePath: string): ConfigLayer {
    if (!fs.existsSync(filePath)) {
      return {};
    }
    let parsed: unknown;
    try {
      parsed = yaml.load(fs.readFileSync(filePath, 'utf8'));
    } catch (error: unknown) {
      if (error instanceof yaml.YAMLException) {
        throw new ConfigError(`Error parsing YAML file: ${filePath}\n${error.message}`, { cause: error });
      }
      throw error;
    }
    if (parsed === undefined || parsed === null) {
      return {};
    }
    if (!isRecord(parsed)) {
      throw new ConfigError(`Config file ${filePath} must contain a mapping at the top level`);
    }
    return parsed;
  }

  static mergeConfigs(target: ConfigLayer, source: ConfigLayer): ConfigLayer {
    const output: ConfigLayer = { ...target };

    for (const [key, sourceValue] of Object.entries(source)) {
      if (sourceValue === undefined) {
        continue;
      }
      const targetValue = output[key];
      if (isRecord(sourceValue) && isRecord(targetValue)) {
        output[key] = this.mergeConfigs(targetValue, sourceValue);
      } else {
        // Arrays and primitives replace
        output[key] = sourceValue;
      }
    }
    return output;
  }

  /**
   * Paths written in a config file are relative to that file, not to the cwd.
   */
  static resolvePaths(layer: ConfigLayer, baseDir: string): ConfigLayer {
    const output: ConfigLayer = { ...layer };
    for (const key of PATH_KEYS) {
      const value = output[key];
      if (typeof value === 'string') output[key] = path.resolve(baseDir, value);
    }

    const strategies = output.strategies;
    if (isRecord(strategies)) {
      const resolved: ConfigLayer = {};
      for (const [name, strategy] of Object.entries(strategies)) {
        if (!isRecord(strategy)) {
          resolved[name] = strategy;
          continue;
        }
        const copy: ConfigLayer = { ...strategy };
        for (const key of STRATEGY_PATH_KEYS) {
          const value = copy[key];
          if (typeof value === 'string') copy[key] = path.resolve(baseDir, value);
        }
        resolved[name] = copy;
      }
      output.strategies = resolved;
    }
    return output;
  }

  /**
   * Layers schema defaults < config file < flags and validates the result.
   *
   * @throws ConfigError on unreadable or invalid configuration
   */
  static load(options: ConfigOptions = {}): HarnessConfig {
    const cwd = options.cwd ?? process.cwd();

    // Explicit --config wins over the file in the cwd; they are not layered.
    let configPath = path.join(cwd, DEFAULT_CONFIG_FILE);
    if (options.configPath) {
      configPath = path.resolve(cwd, options.configPath);
      if (!fs.existsSync(configPath)) {
        throw new ConfigError(`Config file not found: ${options.configPath}`);
      }
    }
    const fileConfig = this.resolvePaths(this.loadYaml(configPath), path.dirname(configPath));

    const merged = this.mergeConfigs(fileConfig, options.flags ?? {});

    const result = HarnessConfigSchema.safeParse(merged);
    if (!result.success) {
      const issues = result.error.issues
        .map((i) => `- ${i.path.join('.')}: ${i.message}`)
        .join('\n');
      throw new ConfigError(`Configuration validation failed:\n${issues}`);
    }
    return result.data;
  }
}
