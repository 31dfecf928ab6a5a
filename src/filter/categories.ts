/**
 * @module categories
 * @description Default PHI/PII detection rules.
 *
 * Masking applies the categories in array order. Specific rules come before
 * the loose `phone` rule so that a card number or SSN is never half-eaten by
 * a phone match. Every unbounded run is pinned to its start by a lookbehind
 * or a keyword, so matching stays linear in the input length.
 */

export interface PhiCategory {
  /** `[A-Za-z][A-Za-z0-9]*`; upper-cased into the redaction token */
  readonly name: string;
  /** Must carry the `g` flag */
  readonly pattern: RegExp;
}

/**
 * Email address.
 * Matches: user@domain.tld, first.last+tag@sub.example.co.uk
 * The lookbehind pins the start to the beginning of a local-part run.
 */
const email: PhiCategory = {
  name: "email",
  pattern:
    /(?<![A-Za-z0-9._%+-])[A-Za-z0-9._%+-]+@[A-Za-z0-9-]+(?:\.[A-Za-z0-9-]+)*\.[A-Za-z]{2,}/g,
};

/**
 * Payment card number, four groups of four digits.
 * Matches: 4111111111111111, 4111-1111-1111-1111, 4111 1111 1111 1111
 */
const creditCard: PhiCategory = {
  name: "creditCard",
  pattern: /\b(?:\d{4}[- ]?){3}\d{4}\b/g,
};

/**
 * US Social Security Number.
 * Format: XXX-XX-XXXX
 */
const ssn: PhiCategory = {
  name: "ssn",
  pattern: /\b\d{3}-\d{2}-\d{4}\b/g,
};

/**
 * Medical record number introduced by a keyword; the keyword is masked too.
 * Matches: MRN: 0048213, mrn#55555, patient_id 123456, Patient ID:    98765
 */
const medicalRecordNumber: PhiCategory = {
  name: "medicalRecordNumber",
  pattern: /\b(?:MRN|patient[_ ]?id)[\s:#]*\d{5,}/gi,
};

/**
 * Date of birth introduced by a keyword; the keyword is masked too.
 * Matches: DOB: 04/12/1987, dob 4-12-87, date_of_birth: 12/01/2001
 */
const dateOfBirth: PhiCategory = {
  name: "dateOfBirth",
  pattern:
    /\b(?:DOB|date[_ ]of[_ ]birth)[\s:]*\d{1,2}[/-]\d{1,2}[/-]\d{2,4}\b/gi,
};

/**
 * IPv4 address in dotted-quad form.
 * Matches: 10.0.0.12, 192.168.1.1
 */
const ipAddress: PhiCategory = {
  name: "ipAddress",
  pattern: /\b(?:\d{1,3}\.){3}\d{1,3}\b/g,
};

/**
 * North American phone number.
 * Matches:
 * - 10 digits with optional +1, parentheses and - . or space separators:
 *   555-123-4567, (555) 123-4567, +1 555 123 4567, 5551234567
 * - 7-digit local form with a separator: 555-1234
 */
const phone: PhiCategory = {
  name: "phone",
  pattern:
    /(?<![\w+])(?:\+?1[-. ]?)?(?:(?:\(\d{3}\)|\d{3})[-. ]?\d{3}[-. ]?\d{4}|\d{3}[-. ]\d{4})(?!\w)/g,
};

/** Fixed masking order. Append new categories; never reorder. */
export const DEFAULT_CATEGORIES: readonly PhiCategory[] = Object.freeze([
  email,
  creditCard,
  ssn,
  medicalRecordNumber,
  dateOfBirth,
  ipAddress,
  phone,
]);

/** `[REDACTED_<NAME>]` for a category name. */
export function redactionToken(name: string): string {
  return `[REDACTED_${name.toUpperCase()}]`;
}
