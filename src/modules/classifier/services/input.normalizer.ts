/**
 * INPUT NORMALIZER
 * ================
 * Accepts either request shape and returns ordered feature rows:
 *
 *   columns: { koi_period: [10.5, 20.3], koi_depth: [100.5, 200.8] }
 *   rows:    [{ koi_period: 10.5, koi_depth: 100.5 }, { ... }]
 *
 * Shape is sniffed once from the top-level structure; each shape has
 * its own decoder. Output rows all share one key set.
 */

import { MalformedInputError } from '../../../common/errors.js';
import type { FeatureRow, FeatureValue } from '../contracts/classifier.types.js';

export type ParsedPayload =
  | { shape: 'columns'; columns: Record<string, unknown[]> }
  | { shape: 'rows'; rows: Record<string, unknown>[] };

function isPlainObject(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

function isFeatureValue(v: unknown): v is FeatureValue {
  return (
    v === null || typeof v === 'number' || typeof v === 'string' || typeof v === 'boolean'
  );
}

function toFeatureValue(v: unknown, row: number, feature: string): FeatureValue {
  if (!isFeatureValue(v)) {
    throw new MalformedInputError(
      `Row ${row}: feature '${feature}' must be a number, string, boolean or null`,
      { row, feature }
    );
  }
  return v;
}

export function parsePayload(payload: unknown): ParsedPayload {
  if (isPlainObject(payload)) {
    const columns: Record<string, unknown[]> = {};
    let columnar = true;
    for (const [name, values] of Object.entries(payload)) {
      if (!Array.isArray(values)) {
        columnar = false;
        break;
      }
      columns[name] = values;
    }
    if (columnar) return { shape: 'columns', columns };
  } else if (Array.isArray(payload)) {
    const rows: Record<string, unknown>[] = [];
    for (const r of payload) {
      if (!isPlainObject(r)) break;
      rows.push(r);
    }
    if (rows.length === payload.length) return { shape: 'rows', rows };
  }
  throw new MalformedInputError(
    "'data' must be a mapping of feature name to value list, or a list of feature mappings"
  );
}

function decodeColumns(columns: Record<string, unknown[]>): FeatureRow[] {
  const names = Object.keys(columns);
  if (names.length === 0) {
    throw new MalformedInputError('Empty dataset provided');
  }

  const lengths = names.map((n) => columns[n].length);
  const n = lengths[0];
  const bad = lengths.findIndex((len) => len !== n);
  if (bad !== -1) {
    throw new MalformedInputError(
      `Column lengths differ: '${names[0]}' has ${n} values but '${names[bad]}' has ${lengths[bad]}`,
      { lengths: Object.fromEntries(names.map((name, i) => [name, lengths[i]])) }
    );
  }
  if (n === 0) {
    throw new MalformedInputError('Empty dataset provided');
  }

  const rows: FeatureRow[] = [];
  for (let i = 0; i < n; i++) {
    const row: FeatureRow = {};
    for (const name of names) {
      row[name] = toFeatureValue(columns[name][i], i, name);
    }
    rows.push(row);
  }
  return rows;
}

function decodeRows(raw: Record<string, unknown>[]): FeatureRow[] {
  if (raw.length === 0) {
    throw new MalformedInputError('Empty dataset provided');
  }

  const reference = Object.keys(raw[0]);
  const referenceSet = new Set(reference);

  return raw.map((r, i) => {
    const keys = Object.keys(r);
    const sameKeys = keys.length === referenceSet.size && keys.every((k) => referenceSet.has(k));
    if (!sameKeys) {
      const keySet = new Set(keys);
      const missing = reference.filter((k) => !keySet.has(k));
      const extra = keys.filter((k) => !referenceSet.has(k));
      throw new MalformedInputError(
        `Row ${i} has a different feature set than row 0`,
        { row: i, missing, unexpected: extra }
      );
    }
    const row: FeatureRow = {};
    for (const k of keys) {
      row[k] = toFeatureValue(r[k], i, k);
    }
    return row;
  });
}

export function normalize(payload: unknown): FeatureRow[] {
  const parsed = parsePayload(payload);
  return parsed.shape === 'columns' ? decodeColumns(parsed.columns) : decodeRows(parsed.rows);
}
