const CAMEL_KEY = /^[a-z][a-zA-Z0-9]*$/;
const SNAKE_KEY = /^[a-z][a-z0-9]*(?:_[a-z0-9]+)*$/;

export function toSnakeCase(key: string): string {
  if (!CAMEL_KEY.test(key)) {
    return key;
  }
  return key.replace(/[A-Z]/g, (letter) => `_${letter.toLowerCase()}`);
}

export function toCamelCase(key: string): string {
  if (!SNAKE_KEY.test(key)) {
    return key;
  }
  return key.replace(/_([a-z0-9])/g, (_, letter: string) => letter.toUpperCase());
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function convertKeys(
  value: unknown,
  convert: (key: string) => string,
  preserveChildrenOf: ReadonlySet<string>,
  preserveHere: boolean
): unknown {
  if (Array.isArray(value)) {
    return value.map((entry) => convertKeys(entry, convert, preserveChildrenOf, false));
  }
  if (!isRecord(value)) {
    return value;
  }

  const result: Record<string, unknown> = {};
  for (const [key, entry] of Object.entries(value)) {
    if (entry === undefined) {
      continue;
    }
    const nextKey = preserveHere ? key : convert(key);
    const keepChildKeys = !preserveHere && (preserveChildrenOf.has(key) || preserveChildrenOf.has(nextKey));
    result[nextKey] = convertKeys(entry, convert, preserveChildrenOf, keepChildKeys);
  }
  return result;
}

/**
 * Renames camelCase keys to snake_case for wire output. Keys of the records
 * named in `preserveChildrenOf` (file paths, author names) are kept as they are.
 */
export function snakeCaseKeys(value: unknown, preserveChildrenOf: readonly string[] = []): unknown {
  return convertKeys(value, toSnakeCase, new Set(preserveChildrenOf), false);
}

export function camelCaseKeys(value: unknown, preserveChildrenOf: readonly string[] = []): unknown {
  return convertKeys(value, toCamelCase, new Set(preserveChildrenOf), false);
}
