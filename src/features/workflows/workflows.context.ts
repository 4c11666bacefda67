import type { VariableContext } from './workflows.types';

const TOKEN_SOURCE = '\\$([A-Za-z_][A-Za-z0-9_]*(?:\\.[A-Za-z0-9_]+)*)';
const SINGLE_TOKEN = new RegExp(`^${TOKEN_SOURCE}$`);

export type Lookup = { found: true; value: unknown } | { found: false };

export interface Substitution {
  value: unknown;
  /** Token paths (without `$`) that had no value and were left as text. */
  unresolved: string[];
}

const MISSING: Lookup = { found: false };

export const isPlainObject = (value: unknown): value is Record<string, unknown> => {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
};

const hasOwn = (target: object, key: string): boolean => Object.prototype.hasOwnProperty.call(target, key);

const step = (current: unknown, segment: string): Lookup => {
  if (Array.isArray(current)) {
    const items: unknown[] = current;
    if (segment === 'length') {
      return { found: true, value: items.length };
    }
    // Dotted-field projection over the elements, never a numeric index.
    const projected: unknown[] = [];
    for (const item of items) {
      const inner = step(item, segment);
      if (inner.found) {
        projected.push(inner.value);
      }
    }
    return projected.length > 0 ? { found: true, value: projected } : MISSING;
  }

  if (isPlainObject(current) && hasOwn(current, segment)) {
    const value = current[segment];
    return value === undefined ? MISSING : { found: true, value };
  }

  return MISSING;
};

export const lookupPath = (context: VariableContext, path: string): Lookup => {
  let current: Lookup = { found: true, value: context };
  for (const segment of path.split('.')) {
    if (!current.found) {
      return MISSING;
    }
    current = step(current.value, segment);
  }
  return current;
};

export const stringifyValue = (value: unknown): string => {
  if (typeof value === 'string') {
    return value;
  }
  if (value === undefined) {
    return '';
  }
  if (typeof value === 'object' && value !== null && !(value instanceof Date)) {
    return JSON.stringify(value);
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  return String(value);
};

export const cloneValue = (value: unknown): unknown => {
  if (Array.isArray(value)) {
    return value.map((item: unknown) => cloneValue(item));
  }
  if (isPlainObject(value)) {
    const copy: Record<string, unknown> = {};
    for (const [key, item] of Object.entries(value)) {
      copy[key] = cloneValue(item);
    }
    return copy;
  }
  return value;
};

const substituteString = (template: string, context: VariableContext, unresolved: string[]): unknown => {
  const single = SINGLE_TOKEN.exec(template);
  if (single) {
    const lookup = lookupPath(context, single[1]);
    if (lookup.found) {
      return cloneValue(lookup.value);
    }
    unresolved.push(single[1]);
    return template;
  }

  return template.replace(new RegExp(TOKEN_SOURCE, 'g'), (token: string, path: string) => {
    const lookup = lookupPath(context, path);
    if (lookup.found) {
      return stringifyValue(lookup.value);
    }
    unresolved.push(path);
    return token;
  });
};

const substituteValue = (value: unknown, context: VariableContext, unresolved: string[]): unknown => {
  if (typeof value === 'string') {
    return substituteString(value, context, unresolved);
  }
  if (Array.isArray(value)) {
    return value.map((item: unknown) => substituteValue(item, context, unresolved));
  }
  if (isPlainObject(value)) {
    const copy: Record<string, unknown> = {};
    for (const [key, item] of Object.entries(value)) {
      copy[key] = substituteValue(item, context, unresolved);
    }
    return copy;
  }
  return value;
};

/**
 * Replaces `$name` and `$name.path` tokens throughout a string, object or
 * array. A string that is exactly one token takes the variable's own value;
 * tokens embedded in longer text are stringified. Unknown tokens stay as
 * written so the next node can still see them.
 */
export const resolveTemplate = (value: unknown, context: VariableContext): Substitution => {
  const unresolved: string[] = [];
  const resolved = substituteValue(value, context, unresolved);
  return { value: resolved, unresolved };
};

export const substitute = (value: unknown, context: VariableContext): unknown =>
  resolveTemplate(value, context).value;

export const truncate = (text: string, max = 500): string =>
  text.length > max ? `${text.slice(0, max - 3)}...` : text;
