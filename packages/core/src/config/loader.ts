import fs from 'fs';
import path from 'path';
import os from 'os';
import yaml from 'js-yaml';
import {
  APP_DIR,
  ConfigError,
  ConfigSchema,
  type Config,
  type ConfigInput,
} from '@testmend/shared';
import { PROJECT_CONFIG_FILE, findRepoRoot } from '@testmend/repo';

type ConfigLayer = Record<string, unknown>;

export interface ConfigOptions {
  configPath?: string; // CLI override
  flags?: ConfigInput; // CLI flags
  cwd?: string; // Repository root (for repo config)
  env?: NodeJS.ProcessEnv; // Environment variables
}

export interface LoadedConfig {
  config: Config;
  repoRoot: string;
  configPath: string | undefined;
}

function isLayer(value: unknown): value is ConfigLayer {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Finds the repository root from the working directory and loads the
 * configuration that applies there.
 */
export async function resolveConfig(
  configPath?: string,
  flags?: ConfigInput,
  cwd: string = process.cwd(),
): Promise<LoadedConfig> {
  const repoRoot = await findRepoRoot(cwd);
  const config = ConfigLoader.load({ configPath, flags, cwd: repoRoot });
  return { config, repoRoot, configPath };
}

export class ConfigLoader {
  static loadYaml(filePath: string): ConfigLayer {
    try {
      if (!fs.existsSync(filePath)) {
        return {};
      }
      const content = fs.readFileSync(filePath, 'utf8');
      const parsed: unknown = yaml.load(content);
      if (parsed === undefined || parsed === null) {
        return {};
      }
      if (!isLayer(parsed)) {
        throw new ConfigError(`Config file ${filePath} must contain a YAML mapping`);
      }
      return parsed;
    } catch (error: unknown) {
      if (error instanceof yaml.YAMLException) {
        throw new ConfigError(`Error parsing YAML file: ${filePath}\n${error.message}`);
      }
      throw error;
    }
  }

  /** Objects merge key by key; arrays and scalars from `source` replace. */
  static mergeConfigs(target: ConfigLayer, source: ConfigLayer): ConfigLayer {
    const output: ConfigLayer = { ...target };
    for (const [key, sourceValue] of Object.entries(source)) {
      if (sourceValue === undefined) {
        continue;
      }
      const targetValue = output[key];
      output[key] =
        isLayer(sourceValue) && isLayer(targetValue)
          ? this.mergeConfigs(targetValue, sourceValue)
          : sourceValue;
    }
    return output;
  }

  static writeEffectiveConfig(config: Config, dir: string): string {
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
    const filePath = path.join(dir, 'effective-config.json');
    const { provider, ...rest } = config;
    const safe = provider ? { ...rest, provider: { ...provider, api_key: undefined } } : rest;
    fs.writeFileSync(filePath, JSON.stringify(safe, null, 2), 'utf8');
    return filePath;
  }

  static validate(raw: unknown): Config {
    const result = ConfigSchema.safeParse(raw);
    if (!result.success) {
      const issues = result.error.issues
        .map((i) => `- ${i.path.join('.')}: ${i.message}`)
        .join('\n');
      throw new ConfigError(`Configuration validation failed:\n${issues}`);
    }
    return result.data;
  }

  /** Fills `provider.api_key` from `provider.api_key_env` unless set inline. */
  static resolveSecrets(config: Config, env: NodeJS.ProcessEnv = process.env): Config {
    const provider = config.provider;
    if (provider?.api_key_env && !provider.api_key) {
      const key = env[provider.api_key_env];
      if (key) {
        return { ...config, provider: { ...provider, api_key: key } };
      }
    }
    return config;
  }

  /**
   * Merges, in increasing precedence: ~/.testmend/config.yaml,
   * <cwd>/.testmend.yaml, the explicit --config file, then CLI flags, and
   * validates the result against {@link ConfigSchema}.
   */
  static load(options: ConfigOptions = {}): Config {
    const cwd = options.cwd || process.cwd();
    const env = options.env || process.env;

    // 1. User config: ~/.testmend/config.yaml
    const userConfig = this.loadYaml(path.join(os.homedir(), APP_DIR, 'config.yaml'));

    // 2. Repo config: <repoRoot>/.testmend.yaml
    const repoConfig = this.loadYaml(path.join(cwd, PROJECT_CONFIG_FILE));

    // 3. Explicit --config file (if provided)
    let explicitConfig: ConfigLayer = {};
    if (options.configPath) {
      if (!fs.existsSync(options.configPath)) {
        throw new ConfigError(`Config file not found: ${options.configPath}`);
      }
      explicitConfig = this.loadYaml(options.configPath);
    }

    // 4. CLI flags
    const flagConfig: ConfigLayer = options.flags ?? {};

    let merged = this.mergeConfigs({}, userConfig);
    merged = this.mergeConfigs(merged, repoConfig);
    merged = this.mergeConfigs(merged, explicitConfig);
    merged = this.mergeConfigs(merged, flagConfig);

    return this.resolveSecrets(this.validate(merged), env);
  }
}
