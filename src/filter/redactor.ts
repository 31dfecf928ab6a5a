/**
 * @module redactor
 * @description PHI/PII detection and irreversible masking for text and
 * nested JSON structures. Every string a log record or audit entry carries
 * out of the process goes through {@link PhiFilter.mask} first.
 *
 * Matches are replaced by `[REDACTED_<CATEGORY>]` tokens. Tokens contain no
 * digits and no `@`, and construction rejects any category whose pattern
 * matches a token, so masking already-masked text is a no-op.
 */

import { ConfigurationError } from "../errors";
import type { JSONObject, JSONValue } from "../types";
import {
  DEFAULT_CATEGORIES,
  redactionToken,
  type PhiCategory,
} from "./categories";

export interface FilterResult<T> {
  value: T;
  /** True when any string leaf matched any category */
  found: boolean;
}

interface CompiledCategory {
  name: string;
  token: string;
  /** global, used for replacement */
  replacer: RegExp;
  /** non-global, stateless `test()` */
  detector: RegExp;
}

const CATEGORY_NAME = /^[A-Za-z][A-Za-z0-9]*$/;

function compile(categories: readonly PhiCategory[]): CompiledCategory[] {
  const seen = new Set<string>();
  const compiled = categories.map((c) => {
    if (!CATEGORY_NAME.test(c.name)) {
      throw new ConfigurationError(`Invalid PHI category name "${c.name}"`);
    }
    if (seen.has(c.name)) {
      throw new ConfigurationError(`Duplicate PHI category "${c.name}"`);
    }
    if (!c.pattern.global) {
      throw new ConfigurationError(`PHI category "${c.name}" pattern needs the g flag`);
    }
    seen.add(c.name);
    return {
      name: c.name,
      token: redactionToken(c.name),
      replacer: new RegExp(c.pattern.source, c.pattern.flags),
      detector: new RegExp(c.pattern.source, c.pattern.flags.replace("g", "")),
    };
  });

  // A pattern that matches a token would make mask() non-idempotent.
  for (const c of compiled) {
    for (const other of compiled) {
      if (c.detector.test(other.token)) {
        throw new ConfigurationError(
          `PHI category "${c.name}" matches the redaction token ${other.token}`
        );
      }
    }
  }
  return compiled;
}

function isPlainObject(value: unknown): value is JSONObject {
  if (typeof value !== "object" || value === null) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Masks PHI/PII using an ordered, immutable list of categories.
 *
 * @example
 * ```typescript
 * const filter = new PhiFilter([
 *   ...DEFAULT_CATEGORIES,
 *   { name: "insuranceId", pattern: /\bINS-\d{8}\b/g },
 * ]);
 *
 * filter.mask("Contact: john@example.com, policy INS-00412345");
 * // "Contact: [REDACTED_EMAIL], policy [REDACTED_INSURANCEID]"
 * ```
 */
export class PhiFilter {
  private readonly compiled: readonly CompiledCategory[];

  constructor(categories: readonly PhiCategory[] = DEFAULT_CATEGORIES) {
    this.compiled = Object.freeze(compile(categories));
  }

  /** Category names in masking order */
  get categories(): string[] {
    return this.compiled.map((c) => c.name);
  }

  contains(text: unknown): boolean {
    if (typeof text !== "string" || text === "") return false;
    return this.compiled.some((c) => c.detector.test(text));
  }

  detectCategories(text: unknown): Set<string> {
    const found = new Set<string>();
    if (typeof text !== "string" || text === "") return found;
    for (const c of this.compiled) {
      if (c.detector.test(text)) found.add(c.name);
    }
    return found;
  }

  /**
   * Replaces every match of every category, in category order, with its
   * token. Passes repeat until the text stops changing: a token can open a
   * word boundary next to digits an earlier category skipped. Each changing
   * pass removes at least one digit or `@`, so the loop terminates.
   */
  mask(text: string): string;
  mask<T>(text: T): T;
  mask(text: unknown): unknown {
    if (typeof text !== "string" || text === "") return text;

    let current = text;
    for (;;) {
      let next = current;
      for (const c of this.compiled) {
        next = next.replace(c.replacer, c.token);
      }
      if (next === current) return current;
      current = next;
    }
  }

  /**
   * Masks every string leaf of a JSON structure. Numbers, booleans and null
   * pass through; anything that is not a plain object or array is returned
   * as is. The input is never mutated.
   */
  filterStructured(value: JSONValue): FilterResult<JSONValue> {
    let found = false;

    const walk = (v: JSONValue): JSONValue => {
      if (typeof v === "string") {
        const masked = this.mask(v);
        if (masked !== v) found = true;
        return masked;
      }
      if (Array.isArray(v)) return v.map(walk);
      if (isPlainObject(v)) {
        const out: JSONObject = {};
        for (const [k, child] of Object.entries(v)) out[k] = walk(child);
        return out;
      }
      return v;
    };

    return { value: walk(value), found };
  }

  /** {@link filterStructured} for a top-level mapping (log fields, audit details). */
  filterRecord(record: JSONObject): FilterResult<JSONObject> {
    let found = false;
    const out: JSONObject = {};
    for (const [k, v] of Object.entries(record)) {
      const res = this.filterStructured(v);
      out[k] = res.value;
      found ||= res.found;
    }
    return { value: out, found };
  }
}

/** Filter over {@link DEFAULT_CATEGORIES}. */
export const defaultFilter = new PhiFilter();

export const mask = (text: string): string => defaultFilter.mask(text);
export const contains = (text: string): boolean => defaultFilter.contains(text);
export const detectCategories = (text: string): Set<string> =>
  defaultFilter.detectCategories(text);
export const filterStructured = (value: JSONValue): FilterResult<JSONValue> =>
  defaultFilter.filterStructured(value);
