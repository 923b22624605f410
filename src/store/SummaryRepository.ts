import { EventEmitter } from 'events';
import { SummaryValidationError } from '../common/errors';
import { createLogger, LoggingConfig, SummaryLogger } from '../common/logger';
import { joinKey } from '../common/utils';
import { SchemaRegistry } from '../schema/SchemaRegistry';
import { ObjectName, VersionPolicy } from '../schema/types';
import { SummaryValidator } from '../summary/SummaryValidator';
import { ClusterSummary, DeclaredRecord, NodeSummary, SummaryAttributes, SummaryRecord } from '../summary/types';
import { IKeyValueStore } from './types';

export const DEFAULT_DEFINITIONS_KEY = '_NS/performance_monitoring/definitions';

export interface SummaryRepositoryOptions {
  /** Schema version this consumer was written against; checked before every operation */
  expectedSchemaVersion?: string;
  versionPolicy?: VersionPolicy;
  /** Where publishDefinitions() writes the definition document */
  definitionsKey?: string;
  logging?: LoggingConfig;
}

/**
 * SummaryRepository - reads and writes summary records through the registry's key layout.
 *
 * Values are JSON documents. Records are validated on the way in and on the way out,
 * so a reader never sees a summary that does not match the declared attribute set.
 */
export class SummaryRepository extends EventEmitter {
  private readonly validator: SummaryValidator;
  private readonly logger: SummaryLogger;
  private readonly definitionsKey: string;

  constructor(
    private readonly registry: SchemaRegistry,
    private readonly store: IKeyValueStore,
    private readonly options: SummaryRepositoryOptions = {}
  ) {
    super();
    this.validator = new SummaryValidator(registry);
    this.logger = createLogger(options.logging);
    this.definitionsKey = options.definitionsKey ?? DEFAULT_DEFINITIONS_KEY;
  }

  /**
   * Validate and write a summary; resolves with the key it was written to
   */
  async save(record: SummaryRecord | DeclaredRecord): Promise<string> {
    this.ensureCompatible();
    this.validator.validateForWrite(record);
    const key = this.registry.deriveKey(record.objectName, record.attributes);

    await this.store.set(key, JSON.stringify(record.attributes));
    this.logger.store(`Saved ${record.objectName} at ${key}`);
    this.emit('summary:saved', { objectName: record.objectName, key });
    return key;
  }

  /**
   * Load one summary by its unique component; undefined when absent
   */
  async load<N extends ObjectName>(name: N, id: string): Promise<SummaryAttributes[N] | undefined> {
    this.ensureCompatible();
    const key = this.registry.deriveKeyFromId(name, id);
    const raw = await this.store.get(key);
    if (raw === undefined) {
      return undefined;
    }
    return this.decode(name, key, raw);
  }

  /**
   * Load a summary, or return the fallback when none has been written yet
   */
  async loadOrDefault<N extends ObjectName>(name: N, id: string, fallback: SummaryAttributes[N]): Promise<SummaryAttributes[N]> {
    const existing = await this.load(name, id);
    return existing ?? fallback;
  }

  /**
   * All instances under the object's listing key, in key order.
   * Entries that fail validation are skipped and reported through 'summary:invalid'.
   */
  async list<N extends ObjectName>(name: N): Promise<SummaryAttributes[N][]> {
    this.ensureCompatible();
    const entries = await this.store.list(this.registry.getListingKey(name));
    const summaries: SummaryAttributes[N][] = [];

    for (const entry of entries) {
      try {
        summaries.push(this.decode(name, entry.key, entry.value));
      } catch (error) {
        if (!(error instanceof SummaryValidationError)) {
          throw error;
        }
        this.logger.warn(`Skipping invalid ${name} at ${entry.key}: ${error.message}`);
        this.emit('summary:invalid', { objectName: name, key: entry.key, error });
      }
    }
    return summaries;
  }

  /**
   * Remove one summary; resolves false when it did not exist
   */
  async delete(name: ObjectName, id: string): Promise<boolean> {
    this.ensureCompatible();
    const key = this.registry.deriveKeyFromId(name, id);
    const removed = await this.store.delete(key);
    if (removed) {
      this.logger.store(`Deleted ${name} at ${key}`);
      this.emit('summary:deleted', { objectName: name, key });
    }
    return removed;
  }

  /**
   * Load the NodeSummary each reference of a cluster names, skipping ones not written yet
   */
  async resolveNodeSummaries(cluster: ClusterSummary): Promise<NodeSummary[]> {
    const nodes: NodeSummary[] = [];
    for (const reference of cluster.node_summaries) {
      const parsed = this.registry.parseKey(reference);
      if (!parsed || parsed.objectName !== 'NodeSummary') {
        throw new SummaryValidationError('ClusterSummary', [`node_summaries entry '${reference}' is not a NodeSummary key`]);
      }
      const node = await this.load('NodeSummary', parsed.id);
      if (node) {
        nodes.push(node);
      } else {
        this.logger.debug(`Cluster ${cluster.cluster_id} references missing node summary ${reference}`);
      }
    }
    return nodes;
  }

  /**
   * Publish the definition document and its version so readers without this package can fetch it
   */
  async publishDefinitions(): Promise<string> {
    this.ensureCompatible();
    const dataKey = joinKey(this.definitionsKey, 'data');
    await this.store.set(dataKey, this.registry.getSource());
    await this.store.set(joinKey(this.definitionsKey, 'version'), this.registry.version);
    this.logger.store(`Published schema v${this.registry.version} at ${this.definitionsKey}`);
    return dataKey;
  }

  private decode<N extends ObjectName>(name: N, key: string, raw: string): SummaryAttributes[N] {
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : String(error);
      throw new SummaryValidationError(name, [`value at ${key} is not valid JSON: ${errorMessage}`]);
    }
    const summary = this.validator.validate(name, parsed);
    const storedUnder = this.registry.deriveKey(name, summary);
    if (storedUnder !== key) {
      throw new SummaryValidationError(name, [`value at ${key} identifies itself as ${storedUnder}`]);
    }
    return summary;
  }

  private ensureCompatible(): void {
    if (this.options.expectedSchemaVersion !== undefined) {
      this.registry.assertCompatible(this.options.expectedSchemaVersion, this.options.versionPolicy);
    }
  }
}
