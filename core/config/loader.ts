import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import { ConfigError } from '@core/errors';
import { configLogger } from '@core/utils/logger';
import { DEFAULT_CONFIG, type LimitsConfig, type OutputConfig, type ResolvedConfig, type TagweaveConfig } from './types';
import { resolveJsonIndent, resolveLimit } from './validation';

/**
 * Load tagweave configuration from both global and project locations
 */
export class ConfigLoader {
  private globalConfigPath: string;
  private projectConfigPath: string;
  private cachedConfig?: TagweaveConfig;

  constructor(projectPath?: string) {
    // Global config location: ~/.config/tagweave.json
    this.globalConfigPath = path.join(os.homedir(), '.config', 'tagweave.json');

    // Project config location: <project>/tagweave.config.json
    this.projectConfigPath = projectPath
      ? path.join(projectPath, 'tagweave.config.json')
      : path.join(process.cwd(), 'tagweave.config.json');
  }

  /**
   * Load and merge configurations
   */
  load(): TagweaveConfig {
    if (this.cachedConfig) {
      return this.cachedConfig;
    }

    const globalConfig = this.loadConfigFile(this.globalConfigPath);
    const projectConfig = this.loadConfigFile(this.projectConfigPath);

    // Project overrides global
    this.cachedConfig = this.mergeConfigs(globalConfig, projectConfig);

    return this.cachedConfig;
  }

  /**
   * Load and resolve against defaults in one step
   */
  loadResolved(): ResolvedConfig {
    return this.resolve(this.load());
  }

  /**
   * Fill in defaults and reject limits that cannot bound anything
   */
  resolve(config: TagweaveConfig): ResolvedConfig {
    return {
      limits: {
        maxTagLength: resolveLimit('maxTagLength', config.limits?.maxTagLength),
        maxDepth: resolveLimit('maxDepth', config.limits?.maxDepth)
      },
      output: {
        sanitize: config.output?.sanitize ?? DEFAULT_CONFIG.output.sanitize,
        jsonIndent: resolveJsonIndent(config.output?.jsonIndent)
      }
    };
  }

  /**
   * Load a single config file
   */
  private loadConfigFile(filePath: string): TagweaveConfig {
    try {
      if (fs.existsSync(filePath)) {
        const content = fs.readFileSync(filePath, 'utf8');
        return parseConfig(JSON.parse(content), filePath);
      }
    } catch (error) {
      const configError = new ConfigError(`Failed to load config from ${filePath}`, { filePath }, error);
      configLogger.warn(configError.message, {
        code: configError.code,
        error: error instanceof Error ? error.message : String(error)
      });
    }

    return {};
  }

  private mergeConfigs(global: TagweaveConfig, project: TagweaveConfig): TagweaveConfig {
    const merged: TagweaveConfig = {};

    if (global.limits || project.limits) {
      merged.limits = { ...global.limits, ...project.limits };
    }

    if (global.output || project.output) {
      merged.output = { ...global.output, ...project.output };
    }

    return merged;
  }
}

/**
 * Narrow parsed JSON to the config shape, dropping unknown or mistyped keys.
 */
export function parseConfig(raw: unknown, filePath?: string): TagweaveConfig {
  if (!isRecord(raw)) {
    throw new ConfigError('Configuration root must be an object', { filePath });
  }

  const config: TagweaveConfig = {};

  if (isRecord(raw.limits)) {
    const limits: LimitsConfig = {};
    if (typeof raw.limits.maxTagLength === 'number') limits.maxTagLength = raw.limits.maxTagLength;
    if (typeof raw.limits.maxDepth === 'number') limits.maxDepth = raw.limits.maxDepth;
    config.limits = limits;
  }

  if (isRecord(raw.output)) {
    const output: OutputConfig = {};
    if (typeof raw.output.sanitize === 'boolean') output.sanitize = raw.output.sanitize;
    if (typeof raw.output.jsonIndent === 'number') output.jsonIndent = raw.output.jsonIndent;
    config.output = output;
  }

  return config;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
