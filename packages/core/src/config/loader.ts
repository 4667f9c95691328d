import fs from 'fs';
import path from 'path';
import yaml from 'js-yaml';
import { ConfigError, FormatConfigSchema, type FormatConfig } from '@moonfmt/shared';

export interface ConfigOptions {
  configPath?: string; // --config-path
  flags?: Record<string, unknown>; // command-line format overrides
  cwd?: string; // directory searched for the repo config
}

/** Repo config names, looked up in this order in the working directory. */
export const CONFIG_FILENAMES = ['.moonfmt.yaml', 'moonfmt.yaml'] as const;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class ConfigLoader {
  static loadYaml(filePath: string): Record<string, unknown> {
    if (!fs.existsSync(filePath)) {
      return {};
    }
    let parsed: unknown;
    try {
      parsed = yaml.load(fs.readFileSync(filePath, 'utf8'));
    } catch (error: unknown) {
      if (error instanceof yaml.YAMLException) {
        throw new ConfigError(`Error parsing YAML file: ${filePath}\n${error.message}`, {
          cause: error,
        });
      }
      throw error;
    }
    if (parsed === undefined || parsed === null) {
      return {};
    }
    if (!isRecord(parsed)) {
      throw new ConfigError(`Config file must contain a mapping: ${filePath}`);
    }
    return parsed;
  }

  static mergeConfigs(
    target: Record<string, unknown>,
    source: Record<string, unknown>,
  ): Record<string, unknown> {
    const output = { ...target };
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

  static findRepoConfig(cwd: string): string | undefined {
    return CONFIG_FILENAMES.map((name) => path.join(cwd, name)).find((p) => fs.existsSync(p));
  }

  static load(options: ConfigOptions = {}): FormatConfig {
    const cwd = options.cwd || process.cwd();

    // 1. Repo config: <cwd>/.moonfmt.yaml or <cwd>/moonfmt.yaml
    const repoConfigPath = this.findRepoConfig(cwd);
    const repoConfig = repoConfigPath ? this.loadYaml(repoConfigPath) : {};

    // 2. Explicit --config-path file (if provided)
    let explicitConfig: Record<string, unknown> = {};
    if (options.configPath) {
      const explicitPath = path.resolve(cwd, options.configPath);
      if (!fs.existsSync(explicitPath)) {
        throw new ConfigError(`Config file not found: ${options.configPath}`);
      }
      explicitConfig = this.loadYaml(explicitPath);
    }

    // Merge in order of precedence: flags > explicit > repo > defaults (from the schema)
    let mergedConfig = this.mergeConfigs({}, repoConfig);
    mergedConfig = this.mergeConfigs(mergedConfig, explicitConfig);
    mergedConfig = this.mergeConfigs(mergedConfig, options.flags ?? {});

    const result = FormatConfigSchema.safeParse(mergedConfig);

    if (!result.success) {
      const issues = result.error.issues
        .map((i) => `- ${i.path.join('.')}: ${i.message}`)
        .join('\n');
      throw new ConfigError(`Configuration validation failed:\n${issues}`);
    }

    return result.data;
  }
}
