import { config as loadEnv } from 'dotenv';
import { readFileSync, existsSync } from 'fs';
import { join } from 'path';
import type { ZodError } from 'zod';
import { ConfigSchema, FileConfigSchema, type Config, type ConfigOverrides } from './schema.js';
import { defaultConfig } from './defaults.js';
import { ConfigurationError, toError } from '../errors/index.js';

type SectionInput = Record<string, unknown>;

interface ConfigInput {
  monitor: SectionInput;
  sources: SectionInput;
  logging: SectionInput;
}

/**
 * Load configuration from defaults, a config file, the environment and command-line overrides
 * Priority: Overrides > Environment Variables > Config File > Defaults
 */
export class ConfigLoader {
  private config: Config;

  constructor(overrides: ConfigOverrides = {}) {
    // Load .env file if it exists
    loadEnv();

    const input: ConfigInput = {
      monitor: { ...defaultConfig.monitor, filters: [...defaultConfig.monitor.filters] },
      sources: { ...defaultConfig.sources },
      logging: { ...defaultConfig.logging },
    };

    this.loadFromFile(input);
    this.loadFromEnv(input);
    this.mergeConfig(input, overrides);

    this.config = this.validate(input);
  }

  /**
   * Load configuration from config/default.json in the working directory
   */
  private loadFromFile(input: ConfigInput): void {
    const configPath = join(process.cwd(), 'config', 'default.json');
    if (!existsSync(configPath)) {
      return;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(configPath, 'utf-8'));
    } catch (error) {
      throw new ConfigurationError(
        `Failed to load config file ${configPath}: ${toError(error).message}`,
        { configPath },
        toError(error)
      );
    }

    const parsed = FileConfigSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ConfigurationError(
        `Invalid config file ${configPath}: ${formatIssues(parsed.error)}`,
        { configPath }
      );
    }
    this.mergeConfig(input, parsed.data);
  }

  /**
   * Load configuration from IRQTOP_* environment variables
   */
  private loadFromEnv(input: ConfigInput): void {
    const env = process.env;

    // Monitor configuration
    if (env['IRQTOP_INTERVAL']) {
      input.monitor['intervalMs'] = parseInt(env['IRQTOP_INTERVAL'], 10);
    }
    if (env['IRQTOP_ITERATIONS']) {
      input.monitor['iterations'] = parseInt(env['IRQTOP_ITERATIONS'], 10);
    }
    if (env['IRQTOP_ROWS']) {
      input.monitor['rows'] = parseInt(env['IRQTOP_ROWS'], 10);
    }
    if (env['IRQTOP_SORT']) {
      input.monitor['sortBy'] = env['IRQTOP_SORT'];
    }
    if (env['IRQTOP_HIDE_ZERO']) {
      input.monitor['hideZero'] = env['IRQTOP_HIDE_ZERO'] === 'true';
    }
    if (env['IRQTOP_FILTERS']) {
      input.monitor['filters'] = env['IRQTOP_FILTERS']
        .split(',')
        .map(f => f.trim())
        .filter(f => f !== '');
    }
    if (env['IRQTOP_INCLUDE_NON_NUMERIC']) {
      input.monitor['includeNonNumeric'] = env['IRQTOP_INCLUDE_NON_NUMERIC'] === 'true';
    }
    if (env['IRQTOP_NODE']) {
      input.monitor['startNode'] = parseInt(env['IRQTOP_NODE'], 10);
    }
    if (env['IRQTOP_OVERALL']) {
      input.monitor['overall'] = env['IRQTOP_OVERALL'] === 'true';
    }
    if (env['IRQTOP_BATCH']) {
      input.monitor['batch'] = env['IRQTOP_BATCH'] === 'true';
    }

    // Sources configuration
    if (env['IRQTOP_INTERRUPTS_FILE']) {
      input.sources['interruptsFile'] = env['IRQTOP_INTERRUPTS_FILE'];
    }
    if (env['IRQTOP_COMPARE_FILE']) {
      input.sources['compareFile'] = env['IRQTOP_COMPARE_FILE'];
    }
    if (env['IRQTOP_TOPOLOGY_FILE']) {
      input.sources['topologyFile'] = env['IRQTOP_TOPOLOGY_FILE'];
    }
    if (env['IRQTOP_TOPOLOGY_COMMAND']) {
      input.sources['topologyCommand'] = env['IRQTOP_TOPOLOGY_COMMAND'];
    }

    // Logging configuration
    if (env['IRQTOP_LOG_LEVEL']) {
      input.logging['level'] = env['IRQTOP_LOG_LEVEL'];
    }
    if (env['IRQTOP_LOG_FORMAT']) {
      input.logging['format'] = env['IRQTOP_LOG_FORMAT'];
    }
    if (env['IRQTOP_LOG_DIR']) {
      input.logging['dir'] = env['IRQTOP_LOG_DIR'];
    }
    if (env['IRQTOP_LOG_CONSOLE']) {
      input.logging['console'] = env['IRQTOP_LOG_CONSOLE'] === 'true';
    }
  }

  /**
   * Validate configuration using Zod schema
   */
  private validate(input: ConfigInput): Config {
    const result = ConfigSchema.safeParse(input);
    if (!result.success) {
      throw new ConfigurationError(`Configuration validation failed: ${formatIssues(result.error)}`);
    }
    return result.data;
  }

  /**
   * Shallow-merge each section, skipping undefined values (mutates target)
   */
  private mergeConfig(target: ConfigInput, source: ConfigOverrides): void {
    for (const section of ['monitor', 'sources', 'logging'] as const) {
      const values = source[section];
      if (!values) continue;
      for (const [key, value] of Object.entries(values)) {
        if (value !== undefined) {
          target[section][key] = value;
        }
      }
    }
  }

  /**
   * Get the current configuration
   */
  public getConfig(): Config {
    return this.config;
  }
}

function formatIssues(error: ZodError): string {
  return error.issues
    .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

// Singleton instance
let configInstance: ConfigLoader | null = null;

/**
 * Get configuration singleton. Overrides only apply on the first call.
 */
export function getConfig(overrides?: ConfigOverrides): Config {
  if (!configInstance) {
    configInstance = new ConfigLoader(overrides);
  }
  return configInstance.getConfig();
}

/**
 * Reset configuration (useful for testing)
 */
export function resetConfig(): void {
  configInstance = null;
}

export { DEFAULT_INTERRUPTS_FILE } from './defaults.js';
export type { Config, ConfigOverrides, MonitorConfig, SourcesConfig, LoggingConfig } from './schema.js';
