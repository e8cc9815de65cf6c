import fs from 'fs';
import path from 'path';
import os from 'os';
import yaml from 'js-yaml';
import {
  BuildConfigSchema,
  ConfigError,
  type BuildConfig,
  type BuildConfigInput,
} from '@cyforge/shared';

export const USER_CONFIG_DIR = '.cyforge';
export const PROJECT_CONFIG_FILE = '.cyforge.yaml';

type ConfigLayer = Record<string, unknown>;

export interface ConfigOptions {
  configPath?: string; // --config
  flags?: BuildConfigInput; // CLI flags
  cwd?: string; // target directory (for the project config)
  env?: NodeJS.ProcessEnv;
  homeDir?: string;
}

function isPlainObject(value: unknown): value is ConfigLayer {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class ConfigLoader {
  static loadYaml(filePath: string): ConfigLayer {
    let parsed: unknown;
    try {
      if (!fs.existsSync(filePath)) {
        return {};
      }
      const content = fs.readFileSync(filePath, 'utf8');
      parsed = yaml.load(content);
    } catch (error: unknown) {
      if (error instanceof yaml.YAMLException) {
        throw new ConfigError(`Error parsing YAML file: ${filePath}\n${error.message}`, {
          cause: error,
        });
      }
      throw error;
    }

    // An empty file parses to undefined.
    if (parsed === undefined || parsed === null) {
      return {};
    }
    if (!isPlainObject(parsed)) {
      throw new ConfigError(`Config file must contain a mapping: ${filePath}`);
    }
    return parsed;
  }

  static mergeConfigs(target: ConfigLayer, source: ConfigLayer): ConfigLayer {
    const output: ConfigLayer = { ...target };
    for (const key of Object.keys(source)) {
      const sourceValue = source[key];
      if (sourceValue === undefined) {
        continue;
      }
      const targetValue = output[key];
      if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
        output[key] = this.mergeConfigs(targetValue, sourceValue);
      } else {
        // Arrays and primitives replace
        output[key] = sourceValue;
      }
    }
    return output;
  }

  /**
   * Settings taken from the environment: CYFORGE_JOBS and CYFORGE_COMPILER.
   */
  static fromEnv(env: NodeJS.ProcessEnv): ConfigLayer {
    const layer: ConfigLayer = {};
    const jobs = env.CYFORGE_JOBS?.trim();
    if (jobs) {
      if (!/^\d+$/.test(jobs)) {
        throw new ConfigError(`CYFORGE_JOBS must be a positive integer, got "${jobs}"`);
      }
      layer.concurrency = Number(jobs);
    }
    const compiler = env.CYFORGE_COMPILER?.trim();
    if (compiler) {
      layer.compiler = { command: compiler };
    }
    return layer;
  }

  static load(options: ConfigOptions = {}): BuildConfig {
    const cwd = options.cwd || process.cwd();
    const env = options.env || process.env;
    const homeDir = options.homeDir || os.homedir();

    // 1. User config: ~/.cyforge/config.yaml
    const userConfig = this.loadYaml(path.join(homeDir, USER_CONFIG_DIR, 'config.yaml'));

    // 2. Project config: <target>/.cyforge.yaml
    const projectConfig = this.loadYaml(path.join(cwd, PROJECT_CONFIG_FILE));

    // 3. Explicit --config file (if provided)
    let explicitConfig: ConfigLayer = {};
    if (options.configPath) {
      if (!fs.existsSync(options.configPath)) {
        throw new ConfigError(`Config file not found: ${options.configPath}`);
      }
      explicitConfig = this.loadYaml(options.configPath);
    }

    // 4. Environment, 5. CLI flags
    const envConfig = this.fromEnv(env);
    const flagConfig: ConfigLayer = { ...options.flags };

    let merged: ConfigLayer = {};
    for (const layer of [userConfig, projectConfig, explicitConfig, envConfig, flagConfig]) {
      merged = this.mergeConfigs(merged, layer);
    }

    const result = BuildConfigSchema.safeParse(merged);
    if (!result.success) {
      const issues = result.error.issues
        .map((i) => `- ${i.path.join('.')}: ${i.message}`)
        .join('\n');
      throw new ConfigError(`Configuration validation failed:\n${issues}`);
    }
    return result.data;
  }
}
