import type { JSONObject, JSONValue } from "../types";

export interface NormalizedFields {
  value: JSONObject;
  /** Dotted paths of values replaced by a string fallback */
  degraded: string[];
}

export interface SerializedError extends JSONObject {
  name: string;
  message: string;
}

/** `{ name, message, stack? }` for anything thrown. */
export function serializeError(err: unknown): SerializedError {
  if (err instanceof Error) {
    const out: SerializedError = { name: err.name, message: err.message };
    if (err.stack) out["stack"] = err.stack;
    return out;
  }
  return { name: "NonError", message: safeString(err) };
}

function safeString(value: unknown): string {
  try {
    return String(value);
  } catch {
    return "[Unrepresentable]";
  }
}

function fallback(value: unknown): string {
  if (typeof value === "function") {
    return `[Function ${value.name || "anonymous"}]`;
  }
  return safeString(value);
}

/**
 * Converts arbitrary caller fields into JSON values.
 *
 * - undefined object members are dropped, undefined array items become null
 * - Date → ISO string, Error → {@link serializeError}
 * - objects with `toJSON()` are replaced by its result
 * - functions, symbols, bigints, non-finite numbers, Maps, Sets and cycles
 *   are stringified and their path reported in `degraded`
 */
export function normalizeFields(fields: Record<string, unknown>): NormalizedFields {
  const degraded: string[] = [];
  const ancestors = new Set<object>();

  const degrade = (path: string, value: unknown): string => {
    degraded.push(path);
    return fallback(value);
  };

  const walk = (value: unknown, path: string): JSONValue | undefined => {
    switch (typeof value) {
      case "undefined":
        return undefined;
      case "string":
      case "boolean":
        return value;
      case "number":
        return Number.isFinite(value) ? value : degrade(path, value);
      case "bigint":
      case "symbol":
      case "function":
        return degrade(path, value);
    }

    if (value === null) return null;
    if (typeof value !== "object") return degrade(path, value);

    if (value instanceof Date) {
      return Number.isNaN(value.getTime()) ? degrade(path, value) : value.toISOString();
    }
    if (value instanceof Error) return serializeError(value);
    if (value instanceof Map || value instanceof Set) return degrade(path, value);

    if (ancestors.has(value)) {
      degraded.push(path);
      return "[Circular]";
    }

    ancestors.add(value);
    try {
      if (Array.isArray(value)) {
        return value.map((item, i) => walk(item, `${path}.${i}`) ?? null);
      }

      const toJSON: unknown = Reflect.get(value, "toJSON");
      if (typeof toJSON === "function") {
        return walk(toJSON.call(value), path) ?? null;
      }

      const out: JSONObject = {};
      for (const [k, child] of Object.entries(value)) {
        const v = walk(child, `${path}.${k}`);
        if (v !== undefined) out[k] = v;
      }
      return out;
    } catch {
      // throwing getter or toJSON
      return degrade(path, "[Unserializable]");
    } finally {
      ancestors.delete(value);
    }
  };

  const value: JSONObject = {};
  for (const [key, raw] of Object.entries(fields)) {
    const v = walk(raw, key);
    if (v !== undefined) value[key] = v;
  }
  return { value, degraded };
}
