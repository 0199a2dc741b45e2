import { SerializationError, fail, ok, type Result } from './errors';

export type DatasetRecord = Readonly<Record<string, unknown>>;

type Problem = { path: string; reason: string };

const joinPath = (parent: string, key: string | number): string => {
  if (typeof key === 'number') return `${parent}[${key}]`;
  return parent ? `${parent}.${key}` : key;
};

/**
 * Walk a value and report the first thing JSON cannot carry faithfully.
 * JSON.stringify would silently drop or null these, so they fail the batch instead.
 */
const findProblem = (value: unknown, path: string, ancestors: object[]): Problem | undefined => {
  switch (typeof value) {
    case 'string':
    case 'boolean':
      return undefined;
    case 'number':
      return Number.isFinite(value) ? undefined : { path, reason: `non-finite number ${value}` };
    case 'bigint':
    case 'function':
    case 'symbol':
    case 'undefined':
      return { path, reason: `${typeof value} is not JSON-serializable` };
  }

  if (value === null) return undefined;
  if (typeof value !== 'object') return { path, reason: 'unsupported value' };

  if (ancestors.includes(value)) {
    return { path, reason: 'circular reference' };
  }

  // Dates and similar serialize through toJSON
  if ('toJSON' in value && typeof value.toJSON === 'function') return undefined;

  const nextAncestors = [...ancestors, value];

  if (Array.isArray(value)) {
    for (let i = 0; i < value.length; i++) {
      const problem = findProblem(value[i], joinPath(path, i), nextAncestors);
      if (problem) return problem;
    }
    return undefined;
  }

  for (const [key, child] of Object.entries(value)) {
    const problem = findProblem(child, joinPath(path, key), nextAncestors);
    if (problem) return problem;
  }
  return undefined;
};

/**
 * Serialize records as JSON Lines: one JSON object per line, joined with "\n", input order kept.
 * Any unserializable record fails the whole batch; no partial output is returned.
 */
export const toLineDelimited = (records: ReadonlyArray<DatasetRecord>): Result<string, SerializationError> => {
  const lines: string[] = [];

  for (let index = 0; index < records.length; index++) {
    const record = records[index];
    const problem = findProblem(record, '', []);
    if (problem) {
      const where = problem.path || '<record>';
      return fail(new SerializationError(index, problem.path, `Record ${index} field ${where}: ${problem.reason}`));
    }

    try {
      lines.push(JSON.stringify(record));
    } catch (err) {
      const detail = err instanceof Error ? err.message : String(err);
      return fail(new SerializationError(index, '', `Record ${index}: ${detail}`, { cause: err }));
    }
  }

  return ok(lines.join('\n'));
};
