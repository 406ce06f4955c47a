import type { Document, Filter, PipelineStage, Projection, Sort, UpdateSpec } from '../document-store.js';

// A small subset of the MongoDB query language, enough for the in-memory store.

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value) && !(value instanceof Date);
}

function isOperatorObject(value: unknown): value is Record<string, unknown> {
  if (!isPlainObject(value)) return false;
  const keys = Object.keys(value);
  return keys.length > 0 && keys.every(key => key.startsWith('$'));
}

export function resolvePath(doc: unknown, path: string): unknown {
  let current: unknown = doc;
  for (const segment of path.split('.')) {
    if (!isPlainObject(current)) {
      return undefined;
    }
    current = current[segment];
  }
  return current;
}

export function setPath(doc: Document, path: string, value: unknown): void {
  const segments = path.split('.');
  let current: Record<string, unknown> = doc;
  for (const segment of segments.slice(0, -1)) {
    const next = current[segment];
    if (isPlainObject(next)) {
      current = next;
    } else {
      const created: Record<string, unknown> = {};
      current[segment] = created;
      current = created;
    }
  }
  current[segments[segments.length - 1]] = value;
}

export function deletePath(doc: Document, path: string): void {
  const segments = path.split('.');
  const parent = segments.length === 1 ? doc : resolvePath(doc, segments.slice(0, -1).join('.'));
  if (isPlainObject(parent)) {
    delete parent[segments[segments.length - 1]];
  }
}

export function valuesEqual(a: unknown, b: unknown): boolean {
  if (a instanceof Date && b instanceof Date) {
    return a.getTime() === b.getTime();
  }
  if (Array.isArray(a) && Array.isArray(b)) {
    return a.length === b.length && a.every((item, index) => valuesEqual(item, b[index]));
  }
  if (isPlainObject(a) && isPlainObject(b)) {
    const keysA = Object.keys(a);
    const keysB = Object.keys(b);
    return keysA.length === keysB.length && keysA.every(key => valuesEqual(a[key], b[key]));
  }
  return a === b;
}

function typeRank(value: unknown): number {
  if (value === undefined || value === null) return 0;
  if (typeof value === 'number') return 1;
  if (typeof value === 'string') return 2;
  if (isPlainObject(value)) return 3;
  if (Array.isArray(value)) return 4;
  if (typeof value === 'boolean') return 5;
  if (value instanceof Date) return 6;
  return 7;
}

export function compareValues(a: unknown, b: unknown): number {
  const rankA = typeRank(a);
  const rankB = typeRank(b);
  if (rankA !== rankB) {
    return rankA - rankB;
  }
  if (typeof a === 'number' && typeof b === 'number') {
    return a - b;
  }
  if (typeof a === 'string' && typeof b === 'string') {
    return a < b ? -1 : a > b ? 1 : 0;
  }
  if (a instanceof Date && b instanceof Date) {
    return a.getTime() - b.getTime();
  }
  if (typeof a === 'boolean' && typeof b === 'boolean') {
    return Number(a) - Number(b);
  }
  return 0;
}

function equalsForMatch(actual: unknown, expected: unknown): boolean {
  if (expected === null) {
    return actual === null || actual === undefined;
  }
  if (Array.isArray(actual) && !Array.isArray(expected)) {
    return actual.some(item => valuesEqual(item, expected));
  }
  return valuesEqual(actual, expected);
}

function comparable(actual: unknown, expected: unknown, test: (order: number) => boolean): boolean {
  const candidates = Array.isArray(actual) ? actual : [actual];
  return candidates.some(candidate => {
    if (candidate === undefined || typeRank(candidate) !== typeRank(expected)) {
      return false;
    }
    return test(compareValues(candidate, expected));
  });
}

function asList(operator: string, value: unknown): unknown[] {
  if (!Array.isArray(value)) {
    throw new Error(`${operator} needs an array`);
  }
  return value;
}

function matchesOperator(actual: unknown, operator: string, operand: unknown): boolean {
  switch (operator) {
    case '$eq':
      return equalsForMatch(actual, operand);
    case '$ne':
      return !equalsForMatch(actual, operand);
    case '$in':
      return asList(operator, operand).some(candidate => equalsForMatch(actual, candidate));
    case '$nin':
      return !asList(operator, operand).some(candidate => equalsForMatch(actual, candidate));
    case '$gt':
      return comparable(actual, operand, order => order > 0);
    case '$gte':
      return comparable(actual, operand, order => order >= 0);
    case '$lt':
      return comparable(actual, operand, order => order < 0);
    case '$lte':
      return comparable(actual, operand, order => order <= 0);
    case '$exists':
      return (actual !== undefined) === Boolean(operand);
    default:
      throw new Error(`Unsupported query operator ${operator}`);
  }
}

function matchesCondition(actual: unknown, condition: unknown): boolean {
  if (isOperatorObject(condition)) {
    return Object.entries(condition).every(([operator, operand]) => matchesOperator(actual, operator, operand));
  }
  return equalsForMatch(actual, condition);
}

function asFilterList(operator: string, value: unknown): Filter[] {
  return asList(operator, value).map(entry => {
    if (!isPlainObject(entry)) {
      throw new Error(`${operator} entries must be objects`);
    }
    return entry;
  });
}

export function matchesFilter(doc: Document, filter: Filter): boolean {
  return Object.entries(filter).every(([key, condition]) => {
    switch (key) {
      case '$and':
        return asFilterList(key, condition).every(sub => matchesFilter(doc, sub));
      case '$or':
        return asFilterList(key, condition).some(sub => matchesFilter(doc, sub));
      case '$nor':
        return !asFilterList(key, condition).some(sub => matchesFilter(doc, sub));
      default:
        return matchesCondition(resolvePath(doc, key), condition);
    }
  });
}

/** Equality fields of a filter, used to seed an upserted document. */
export function seedFromFilter(filter: Filter): Document {
  const seed: Document = {};
  for (const [key, condition] of Object.entries(filter)) {
    if (key.startsWith('$')) continue;
    if (isOperatorObject(condition)) {
      if ('$eq' in condition) {
        setPath(seed, key, structuredClone(condition.$eq));
      }
      continue;
    }
    setPath(seed, key, structuredClone(condition));
  }
  return seed;
}

const APPLIED_OPERATORS = ['$set', '$unset', '$inc', '$setOnInsert', '$push', '$rename'];

export function applyUpdate(doc: Document, update: UpdateSpec, isInsert: boolean): void {
  const unsupported = Object.keys(update).find(operator => !APPLIED_OPERATORS.includes(operator));
  if (unsupported) {
    throw new Error(`Unsupported update operator ${unsupported}`);
  }
  for (const [path, value] of Object.entries(update.$set ?? {})) {
    setPath(doc, path, structuredClone(value));
  }
  for (const path of Object.keys(update.$unset ?? {})) {
    deletePath(doc, path);
  }
  for (const [path, amount] of Object.entries(update.$inc ?? {})) {
    const current = resolvePath(doc, path);
    let base = 0;
    if (typeof current === 'number') {
      base = current;
    } else if (current !== undefined) {
      throw new Error(`Cannot apply $inc to non-numeric field ${path}`);
    }
    setPath(doc, path, base + amount);
  }
  if (isInsert) {
    for (const [path, value] of Object.entries(update.$setOnInsert ?? {})) {
      setPath(doc, path, structuredClone(value));
    }
  }
  for (const [path, value] of Object.entries(update.$push ?? {})) {
    const current = resolvePath(doc, path);
    if (current === undefined) {
      setPath(doc, path, [structuredClone(value)]);
    } else if (Array.isArray(current)) {
      current.push(structuredClone(value));
    } else {
      throw new Error(`Cannot apply $push to non-array field ${path}`);
    }
  }
  for (const [from, to] of Object.entries(update.$rename ?? {})) {
    const current = resolvePath(doc, from);
    if (current !== undefined) {
      deletePath(doc, from);
      setPath(doc, to, current);
    }
  }
}

export function applyProjection(doc: Document, projection: Projection | undefined): Document {
  if (!projection || Object.keys(projection).length === 0) {
    return doc;
  }
  const inclusive = Object.entries(projection).some(([key, flag]) => key !== '_id' && flag === 1);
  if (inclusive) {
    const projected: Document = {};
    if (projection._id !== 0 && doc._id !== undefined) {
      projected._id = doc._id;
    }
    for (const [path, flag] of Object.entries(projection)) {
      if (flag !== 1 || path === '_id') continue;
      const value = resolvePath(doc, path);
      if (value !== undefined) {
        setPath(projected, path, value);
      }
    }
    return projected;
  }
  const projected = structuredClone(doc);
  for (const [path, flag] of Object.entries(projection)) {
    if (flag === 0) {
      deletePath(projected, path);
    }
  }
  return projected;
}

export function sortDocuments(docs: Document[], sort: Sort | undefined): Document[] {
  if (!sort) {
    return docs;
  }
  const keys = Object.entries(sort);
  return [...docs].sort((a, b) => {
    for (const [path, direction] of keys) {
      const order = compareValues(resolvePath(a, path), resolvePath(b, path));
      if (order !== 0) {
        return order * direction;
      }
    }
    return 0;
  });
}

function toSort(value: unknown): Sort {
  if (!isPlainObject(value)) {
    throw new Error('$sort needs an object');
  }
  const sort: Sort = {};
  for (const [path, direction] of Object.entries(value)) {
    if (direction !== 1 && direction !== -1) {
      throw new Error(`Invalid sort direction for ${path}`);
    }
    sort[path] = direction;
  }
  return sort;
}

function toProjection(value: unknown): Projection {
  if (!isPlainObject(value)) {
    throw new Error('$project needs an object');
  }
  const projection: Projection = {};
  for (const [path, flag] of Object.entries(value)) {
    if (flag === 1 || flag === true) {
      projection[path] = 1;
    } else if (flag === 0 || flag === false) {
      projection[path] = 0;
    } else {
      throw new Error(`Unsupported $project expression for ${path}`);
    }
  }
  return projection;
}

function toCount(value: unknown, stage: string): number {
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 0) {
    throw new Error(`${stage} needs a non-negative integer`);
  }
  return value;
}

function evaluateExpression(doc: Document, expression: unknown): unknown {
  if (typeof expression === 'string' && expression.startsWith('$')) {
    return resolvePath(doc, expression.slice(1));
  }
  return expression;
}

function groupDocuments(docs: Document[], spec: unknown): Document[] {
  if (!isPlainObject(spec) || !('_id' in spec)) {
    throw new Error('$group needs an _id expression');
  }
  const { _id: idExpression, ...accumulators } = spec;
  const groups: Array<{ key: unknown; doc: Document }> = [];
  for (const doc of docs) {
    const key = evaluateExpression(doc, idExpression) ?? null;
    let group = groups.find(candidate => valuesEqual(candidate.key, key));
    if (!group) {
      group = { key, doc: { _id: key } };
      for (const field of Object.keys(accumulators)) {
        group.doc[field] = 0;
      }
      groups.push(group);
    }
    for (const [field, accumulator] of Object.entries(accumulators)) {
      if (!isPlainObject(accumulator) || !('$sum' in accumulator)) {
        throw new Error(`Unsupported accumulator for ${field}`);
      }
      const amount = evaluateExpression(doc, accumulator.$sum);
      const current = group.doc[field];
      if (typeof amount === 'number' && typeof current === 'number') {
        group.doc[field] = current + amount;
      }
    }
  }
  return groups.map(group => group.doc);
}

export function runPipeline(input: Document[], pipeline: PipelineStage[]): Document[] {
  let docs = input;
  for (const stage of pipeline) {
    const entries = Object.entries(stage);
    if (entries.length !== 1) {
      throw new Error('Pipeline stages must have exactly one operator');
    }
    const [name, spec] = entries[0];
    switch (name) {
      case '$match': {
        if (!isPlainObject(spec)) throw new Error('$match needs an object');
        docs = docs.filter(doc => matchesFilter(doc, spec));
        break;
      }
      case '$sort':
        docs = sortDocuments(docs, toSort(spec));
        break;
      case '$skip':
        docs = docs.slice(toCount(spec, name));
        break;
      case '$limit':
        docs = docs.slice(0, toCount(spec, name));
        break;
      case '$project': {
        const projection = toProjection(spec);
        docs = docs.map(doc => applyProjection(doc, projection));
        break;
      }
      case '$group':
        docs = groupDocuments(docs, spec);
        break;
      case '$count': {
        if (typeof spec !== 'string' || spec.length === 0) throw new Error('$count needs a field name');
        docs = docs.length === 0 ? [] : [{ [spec]: docs.length }];
        break;
      }
      default:
        throw new Error(`Unsupported pipeline stage ${name}`);
    }
  }
  return docs;
}
