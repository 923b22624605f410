import * as yaml from 'js-yaml';
import { promises as fs } from 'fs';
import { EventEmitter } from 'events';
import { LoggingConfig } from '../common/logger';
import { isPlainObject } from '../common/utils';
import { DEFAULT_HEARTBEAT_THRESHOLD_MS } from '../aggregation/NodeSummaryBuilder';
import { DEFAULT_DEFINITIONS_PATH } from '../schema/DefinitionLoader';
import { SchemaRegistry } from '../schema/SchemaRegistry';
import { VersionPolicy } from '../schema/types';
import { DEFAULT_DEFINITIONS_KEY, SummaryRepositoryOptions } from '../store/SummaryRepository';

/**
 * YAML configuration schema for summary producers and consumers
 */
export interface MonitoringConfig {
  /** Schema configuration */
  schema?: {
    /** Definition document to build the registry from */
    definitions_path?: string;

    /** Version this deployment was written against */
    expected_version?: string;

    /** How strictly expected_version is compared */
    version_policy?: VersionPolicy;
  };

  /** Coordination store configuration */
  store?: {
    /** Key the definition document is published under */
    definitions_key?: string;
  };

  /** Node status derivation */
  node_status?: {
    /** A node not seen for this long is DOWN (ms) */
    heartbeat_threshold_ms?: number;
  };

  logging?: {
    enable_registry_logs?: boolean;
    enable_store_logs?: boolean;
    enable_aggregator_logs?: boolean;
    enable_test_mode?: boolean;
  };

  /** Environment-specific overrides */
  environments?: {
    [env: string]: Omit<MonitoringConfig, 'environments'>;
  };
}

const VERSION_POLICIES: readonly VersionPolicy[] = ['exact', 'same-major'];
const SECTIONS = ['schema', 'store', 'node_status', 'logging'] as const;
const LOGGING_FLAGS = ['enable_registry_logs', 'enable_store_logs', 'enable_aggregator_logs', 'enable_test_mode'] as const;

/**
 * Loads the monitoring YAML configuration, applies environment overrides and
 * hands out the settings the registry and repository need.
 */
export class MonitoringConfiguration extends EventEmitter {
  private config: MonitoringConfig = {};
  /** Configuration as loaded, before environment overrides */
  private baseConfig: MonitoringConfig = {};
  private configPath: string | null = null;
  private currentEnvironment: string;

  constructor(environment: string = 'development') {
    super();
    this.currentEnvironment = environment;
  }

  /**
   * Load configuration from YAML file
   */
  async loadFromFile(filePath: string): Promise<void> {
    try {
      const yamlContent = await fs.readFile(filePath, 'utf8');
      this.baseConfig = this.parseFromYaml(yamlContent);
      this.configPath = filePath;

      this.applyEnvironmentOverrides();

      this.emit('config-loaded', { filePath, config: this.config });
    } catch (error) {
      this.emit('config-error', { filePath, error });
      const errorMessage = error instanceof Error ? error.message : String(error);
      throw new Error(`Failed to load monitoring configuration from ${filePath}: ${errorMessage}`);
    }
  }

  /**
   * Parse YAML content into configuration object
   */
  parseFromYaml(yamlContent: string): MonitoringConfig {
    try {
      const parsed: unknown = yaml.load(yamlContent);
      // An empty document means "all defaults"
      if (parsed === undefined || parsed === null) {
        return {};
      }
      if (!isPlainObject(parsed)) {
        throw new Error('configuration must be a mapping');
      }
      this.restoreVersionLiterals(parsed, yaml.load(yamlContent, { schema: yaml.FAILSAFE_SCHEMA }));
      if (!this.isMonitoringConfig(parsed)) {
        throw new Error('configuration must be a mapping');
      }
      this.validateConfiguration(parsed);
      return parsed;
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : String(error);
      throw new Error(`Failed to parse monitoring configuration: ${errorMessage}`);
    }
  }

  /**
   * Use an already parsed configuration
   */
  setConfig(config: MonitoringConfig): void {
    this.validateConfiguration(config);
    this.baseConfig = config;
    this.applyEnvironmentOverrides();
  }

  getConfig(): MonitoringConfig {
    return this.config;
  }

  getConfigPath(): string | null {
    return this.configPath;
  }

  getDefinitionsPath(): string {
    return this.config.schema?.definitions_path ?? DEFAULT_DEFINITIONS_PATH;
  }

  getHeartbeatThresholdMs(): number {
    return this.config.node_status?.heartbeat_threshold_ms ?? DEFAULT_HEARTBEAT_THRESHOLD_MS;
  }

  getLoggingConfig(): LoggingConfig {
    const logging = this.config.logging ?? {};
    return {
      enableRegistryLogs: logging.enable_registry_logs,
      enableStoreLogs: logging.enable_store_logs,
      enableAggregatorLogs: logging.enable_aggregator_logs,
      enableTestMode: logging.enable_test_mode
    };
  }

  getRepositoryOptions(): SummaryRepositoryOptions {
    return {
      expectedSchemaVersion: this.config.schema?.expected_version,
      versionPolicy: this.config.schema?.version_policy ?? 'exact',
      definitionsKey: this.config.store?.definitions_key ?? DEFAULT_DEFINITIONS_KEY,
      logging: this.getLoggingConfig()
    };
  }

  /**
   * Build the registry this configuration points at, checking the expected version up front
   */
  async createRegistry(): Promise<SchemaRegistry> {
    const registry = await SchemaRegistry.fromFile(this.getDefinitionsPath(), this.getLoggingConfig());
    const expected = this.config.schema?.expected_version;
    if (expected !== undefined) {
      registry.assertCompatible(expected, this.config.schema?.version_policy ?? 'exact');
    }
    return registry;
  }

  /**
   * Save configuration to YAML file
   */
  async saveToFile(filePath: string): Promise<void> {
    try {
      const yamlContent = yaml.dump(this.config, {
        indent: 2,
        lineWidth: 100,
        quotingType: '"',
        forceQuotes: false
      });

      await fs.writeFile(filePath, yamlContent, 'utf8');
      this.emit('config-saved', { filePath });
    } catch (error) {
      this.emit('config-error', { filePath, error });
      const errorMessage = error instanceof Error ? error.message : String(error);
      throw new Error(`Failed to save monitoring configuration to ${filePath}: ${errorMessage}`);
    }
  }

  /**
   * Merge configurations with precedence
   */
  static mergeConfigurations(base: MonitoringConfig, override: Omit<MonitoringConfig, 'environments'>): MonitoringConfig {
    return {
      schema: { ...base.schema, ...override.schema },
      store: { ...base.store, ...override.store },
      node_status: { ...base.node_status, ...override.node_status },
      logging: { ...base.logging, ...override.logging },
      environments: base.environments
    };
  }

  /**
   * Switch environment, re-applying overrides to the loaded configuration
   */
  setEnvironment(environment: string): void {
    this.currentEnvironment = environment;
    this.applyEnvironmentOverrides();
  }

  getEnvironment(): string {
    return this.currentEnvironment;
  }

  private isMonitoringConfig(value: unknown): value is MonitoringConfig {
    return isPlainObject(value);
  }

  /**
   * Validate configuration structure
   */
  private validateConfiguration(config: MonitoringConfig): void {
    for (const section of SECTIONS) {
      const value: unknown = config[section];
      if (value !== undefined && !isPlainObject(value)) {
        throw new Error(`${section} must be a mapping`);
      }
    }

    const schema = config.schema;
    if (schema?.definitions_path !== undefined && typeof schema.definitions_path !== 'string') {
      throw new Error('schema.definitions_path must be a string');
    }
    const expected: unknown = schema?.expected_version;
    if (expected !== undefined && (typeof expected !== 'string' || expected.trim().length === 0)) {
      throw new Error('schema.expected_version must be a version string');
    }
    if (schema?.version_policy !== undefined && !VERSION_POLICIES.includes(schema.version_policy)) {
      throw new Error(`schema.version_policy must be one of ${VERSION_POLICIES.join(', ')}`);
    }

    const definitionsKey: unknown = config.store?.definitions_key;
    if (definitionsKey !== undefined && (typeof definitionsKey !== 'string' || definitionsKey.trim().length === 0)) {
      throw new Error('store.definitions_key must be a non-empty string');
    }

    const threshold = config.node_status?.heartbeat_threshold_ms;
    if (threshold !== undefined && (typeof threshold !== 'number' || !Number.isFinite(threshold) || threshold <= 0)) {
      throw new Error('node_status.heartbeat_threshold_ms must be a positive number');
    }

    const logging = config.logging;
    for (const flag of LOGGING_FLAGS) {
      const enabled: unknown = logging?.[flag];
      if (enabled !== undefined && typeof enabled !== 'boolean') {
        throw new Error(`logging.${flag} must be a boolean`);
      }
    }

    if (config.environments !== undefined) {
      if (!isPlainObject(config.environments)) {
        throw new Error('environments must be a mapping');
      }
      for (const override of Object.values(config.environments)) {
        this.validateConfiguration(override);
      }
    }
  }

  /**
   * Apply environment-specific configuration overrides
   */
  private applyEnvironmentOverrides(): void {
    const overrides = this.baseConfig.environments?.[this.currentEnvironment];
    this.config = overrides ? MonitoringConfiguration.mergeConfigurations(this.baseConfig, overrides) : this.baseConfig;
  }

  /**
   * js-yaml reads an unquoted 1.0 as the number 1; take expected_version as written instead
   */
  private restoreVersionLiterals(config: Record<string, unknown>, literal: unknown): void {
    if (!isPlainObject(literal)) {
      return;
    }
    const { schema, environments } = config;
    const literalSchema = literal.schema;
    if (isPlainObject(schema) && isPlainObject(literalSchema) && typeof schema.expected_version === 'number') {
      schema.expected_version = literalSchema.expected_version;
    }
    const literalEnvironments = literal.environments;
    if (isPlainObject(environments) && isPlainObject(literalEnvironments)) {
      for (const [environment, override] of Object.entries(environments)) {
        if (isPlainObject(override)) {
          this.restoreVersionLiterals(override, literalEnvironments[environment]);
        }
      }
    }
  }
}
