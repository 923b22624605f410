import { ObjectDisabledError, SummaryValidationError } from '../common/errors';
import { isPlainObject, isValidKeyComponent } from '../common/utils';
import { SchemaRegistry } from '../schema/SchemaRegistry';
import { AttributeKind, isObjectName, ObjectName } from '../schema/types';
import { DeclaredRecord, SummaryAttributes, SummaryRecord } from './types';

const KIND_DESCRIPTIONS: Record<AttributeKind, string> = {
  string: 'a string',
  int: 'an integer',
  dict: 'a mapping',
  list: 'a list'
};

const CAPACITY_FIELDS = ['used', 'total', 'percent_used', 'updated_at'] as const;
const CPU_FIELDS = ['percent_used', 'updated_at'] as const;
const UTILIZATION_FIELDS = ['total', 'used', 'percent_used'] as const;

function matchesKind(kind: AttributeKind, value: unknown): boolean {
  switch (kind) {
    case 'string':
      return typeof value === 'string';
    case 'int':
      return typeof value === 'number' && Number.isSafeInteger(value);
    case 'dict':
      return isPlainObject(value);
    case 'list':
      return Array.isArray(value);
  }
}

function checkStringFields(attribute: string, value: unknown, fields: readonly string[], problems: string[]): void {
  if (!isPlainObject(value)) {
    problems.push(`${attribute} must be a mapping`);
    return;
  }
  for (const field of fields) {
    if (typeof value[field] !== 'string') {
      problems.push(`${attribute}.${field} must be a string`);
    }
  }
}

function checkCounts(attribute: string, value: unknown, required: readonly string[], problems: string[]): void {
  if (!isPlainObject(value)) {
    problems.push(`${attribute} must be a mapping`);
    return;
  }
  for (const field of required) {
    if (!(field in value)) {
      problems.push(`${attribute}.${field} is missing`);
    }
  }
  for (const [status, count] of Object.entries(value)) {
    if (count !== undefined && (typeof count !== 'number' || !Number.isFinite(count))) {
      problems.push(`${attribute}.${status} must be a number`);
    }
  }
}

function checkUtilization(value: unknown, problems: string[]): void {
  if (!isPlainObject(value)) {
    problems.push('utilization must be a mapping');
    return;
  }
  for (const field of UTILIZATION_FIELDS) {
    if (typeof value[field] !== 'number' || !Number.isFinite(value[field])) {
      problems.push(`utilization.${field} must be a number`);
    }
  }
}

function checkSdsDetail(value: unknown, problems: string[]): void {
  if (!isPlainObject(value)) {
    problems.push('sds_det must be a mapping');
    return;
  }
  const servicesCount = value.services_count;
  if (servicesCount === undefined || typeof servicesCount === 'string') {
    return;
  }
  if (!isPlainObject(servicesCount)) {
    problems.push('sds_det.services_count must be a mapping or an encoded mapping');
    return;
  }
  for (const [service, counters] of Object.entries(servicesCount)) {
    checkCounts(`sds_det.services_count.${service}`, counters, [], problems);
  }
}

function checkStrings(value: Record<string, unknown>, fields: readonly string[], problems: string[]): void {
  for (const field of fields) {
    if (typeof value[field] !== 'string') {
      problems.push(`${field} must be a string`);
    }
  }
}

/**
 * Validates raw attribute maps against the registry and narrows them to typed summaries.
 *
 * Every declared attribute must be present with a value of its declared type, and
 * nothing undeclared may be carried. Map attributes are checked against the shapes
 * the aggregators publish.
 */
export class SummaryValidator {
  constructor(private readonly registry: SchemaRegistry) {}

  /**
   * Return the value as a typed summary or throw SummaryValidationError
   */
  validate<N extends ObjectName>(name: N, value: unknown): SummaryAttributes[N] {
    const problems: string[] = [];
    if (this.conformsTo(name, value, problems)) {
      return value;
    }
    throw new SummaryValidationError(name, problems);
  }

  /**
   * Validate a record that is about to be written; disabled objects are refused
   */
  validateForWrite<R extends SummaryRecord | DeclaredRecord>(record: R): R {
    if (!this.registry.isEnabled(record.objectName)) {
      throw new ObjectDisabledError(record.objectName);
    }
    const problems = this.collectProblems(record.objectName, record.attributes);
    if (problems.length > 0) {
      throw new SummaryValidationError(record.objectName, problems);
    }
    return record;
  }

  /**
   * List every problem with a value; empty when it is a valid summary.
   * Objects without a typed record are checked against their attribute set only.
   */
  collectProblems(name: string, value: unknown): string[] {
    const definition = this.registry.getObject(name);
    if (!isPlainObject(value)) {
      return ['summary must be a mapping'];
    }

    const problems: string[] = [];
    const report = (problem: string) => {
      if (!problems.includes(problem)) {
        problems.push(problem);
      }
    };

    for (const attribute of definition.attributes) {
      if (!(attribute.name in value)) {
        report(`${attribute.name} is missing`);
      } else if (!matchesKind(attribute.kind, value[attribute.name])) {
        report(`${attribute.name} must be ${KIND_DESCRIPTIONS[attribute.kind]}`);
      }
    }

    const declared = new Set(definition.attributes.map(attribute => attribute.name));
    for (const key of Object.keys(value)) {
      if (!declared.has(key)) {
        report(`${key} is not declared`);
      }
    }

    const id = value[definition.keyAttribute];
    if (typeof id === 'string' && !isValidKeyComponent(id)) {
      report(`${definition.keyAttribute} must be a non-empty key segment without '/'`);
    }

    if (isObjectName(name)) {
      const shapeProblems: string[] = [];
      this.checkShape(name, value, shapeProblems);
      shapeProblems.forEach(report);
    }
    return problems;
  }

  private conformsTo<N extends ObjectName>(name: N, value: unknown, problems: string[]): value is SummaryAttributes[N] {
    problems.push(...this.collectProblems(name, value));
    return problems.length === 0;
  }

  private checkShape(name: ObjectName, value: Record<string, unknown>, problems: string[]): void {
    switch (name) {
      case 'NodeSummary': {
        checkStrings(value, ['name', 'node_id', 'status', 'role', 'cluster_name'], problems);
        checkStringFields('cpu_usage', value.cpu_usage, CPU_FIELDS, problems);
        checkStringFields('memory_usage', value.memory_usage, CAPACITY_FIELDS, problems);
        checkStringFields('storage_usage', value.storage_usage, CAPACITY_FIELDS, problems);
        const alertCount = value.alert_count;
        if (typeof alertCount !== 'number' || !Number.isSafeInteger(alertCount)) {
          problems.push('alert_count must be an integer');
        } else if (alertCount < 0) {
          problems.push('alert_count must not be negative');
        }
        return;
      }
      case 'ClusterSummary': {
        checkStrings(value, ['sds_type', 'cluster_id'], problems);
        checkUtilization(value.utilization, problems);
        checkCounts('hosts_count', value.hosts_count, [], problems);
        checkSdsDetail(value.sds_det, problems);
        const references = value.node_summaries;
        if (!Array.isArray(references)) {
          problems.push('node_summaries must be a list');
          return;
        }
        references.forEach((reference: unknown, index) => {
          if (typeof reference !== 'string' || !this.registry.isInstanceKey('NodeSummary', reference)) {
            problems.push(`node_summaries[${index}] must be a NodeSummary key`);
          }
        });
        return;
      }
      case 'SystemSummary': {
        checkStrings(value, ['sds_type'], problems);
        checkUtilization(value.utilization, problems);
        checkCounts('hosts_count', value.hosts_count, [], problems);
        checkCounts('cluster_count', value.cluster_count, ['total'], problems);
        checkSdsDetail(value.sds_det, problems);
        return;
      }
    }
  }
}
