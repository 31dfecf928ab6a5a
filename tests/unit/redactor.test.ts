import { performance } from "node:perf_hooks";
import { describe, expect, it } from "vitest";
import { ConfigurationError } from "../../src/errors";
import { DEFAULT_CATEGORIES } from "../../src/filter/categories";
import {
  PhiFilter,
  contains,
  detectCategories,
  filterStructured,
  mask,
} from "../../src/filter/redactor";

describe("redactor.ts", () => {
  describe("mask", () => {
    it.each([
      ["Contact john.doe@example.com", "Contact [REDACTED_EMAIL]"],
      ["card 4111 1111 1111 1111 on file", "card [REDACTED_CREDITCARD] on file"],
      ["SSN 123-45-6789", "SSN [REDACTED_SSN]"],
      ["patient MRN: 1234567 admitted", "patient [REDACTED_MEDICALRECORDNUMBER] admitted"],
      ["DOB: 01/02/1980", "[REDACTED_DATEOFBIRTH]"],
      ["MRN:    1234567", "[REDACTED_MEDICALRECORDNUMBER]"],
      ["patient_id:\t\t 00042817 seen", "[REDACTED_MEDICALRECORDNUMBER] seen"],
      ["DOB:      04/12/1987", "[REDACTED_DATEOFBIRTH]"],
      ["from 192.168.1.10", "from [REDACTED_IPADDRESS]"],
      ["call 555-123-4567", "call [REDACTED_PHONE]"],
      ["call (555) 123-4567 today", "call [REDACTED_PHONE] today"],
    ])("masks %j", (input, expected) => {
      expect(mask(input)).toBe(expected);
    });

    it("leaves text without PHI untouched", () => {
      expect(mask("model v2 finished in 41 ms")).toBe("model v2 finished in 41 ms");
      expect(mask("")).toBe("");
    });

    it("masks a dashed card number as a card, not as phone fragments", () => {
      expect(mask("4111-1111-1111-1111")).toBe("[REDACTED_CREDITCARD]");
    });

    it("masks every occurrence", () => {
      expect(mask("a@b.com, c@d.org")).toBe("[REDACTED_EMAIL], [REDACTED_EMAIL]");
    });

    it("is idempotent", () => {
      const samples = [
        "Contact john.doe@example.com or 555-123-4567",
        "SSN 123-45-6789, MRN 99887766, DOB 1/2/80",
        "card 4111111111111111 from 10.0.0.1",
        "already [REDACTED_EMAIL] here",
      ];
      for (const text of samples) {
        const once = mask(text);
        expect(mask(once)).toBe(once);
      }
    });

    it("returns non-string input unchanged", () => {
      const filter = new PhiFilter();
      expect(filter.mask(42)).toBe(42);
      expect(filter.mask(null)).toBeNull();
    });
  });

  describe("matching cost", () => {
    const n = 100_000;

    it.each([
      ["a long digit run", "7".repeat(n)],
      ["a long dotted domain", "x@" + "a.".repeat(n / 2)],
      ["repeated at-signs", "a@".repeat(n / 2)],
      ["dotted digits", "1.".repeat(n / 2)],
      ["a keyword before a huge digit run", "MRN: " + "9".repeat(n)],
      ["a keyword before a huge separator run", "DOB" + " ".repeat(n) + "x"],
    ])("masks %s in linear time", (_label, input) => {
      const started = performance.now();
      mask(input);
      expect(performance.now() - started).toBeLessThan(250);
    });
  });

  describe("contains / detectCategories", () => {
    it("detects PHI", () => {
      expect(contains("reach me at a@b.com")).toBe(true);
      expect(contains("no phi here")).toBe(false);
    });

    it("reports categories in masking order", () => {
      expect([...detectCategories("a@b.com and 123-45-6789")]).toEqual(["email", "ssn"]);
    });

    it("treats non-strings as clean", () => {
      const filter = new PhiFilter();
      expect(filter.contains(123456789)).toBe(false);
      expect(filter.detectCategories(undefined).size).toBe(0);
    });
  });

  describe("filterStructured", () => {
    it("masks nested string leaves and reports the find", () => {
      const input = { a: 1, b: { c: "contact a@b.com" } };
      const res = filterStructured(input);

      expect(res.found).toBe(true);
      expect(res.value).toEqual({ a: 1, b: { c: "contact [REDACTED_EMAIL]" } });
      expect(input.b.c).toBe("contact a@b.com");
    });

    it("walks arrays and keeps non-string leaves", () => {
      const res = filterStructured(["ok", 7, true, null, ["ip 10.1.2.3"]]);

      expect(res.found).toBe(true);
      expect(res.value).toEqual(["ok", 7, true, null, ["ip [REDACTED_IPADDRESS]"]]);
    });

    it("reports nothing found for clean input", () => {
      expect(filterStructured({ status: "ok", count: 3 })).toEqual({
        value: { status: "ok", count: 3 },
        found: false,
      });
    });

    it("filterRecord masks a top-level mapping", () => {
      const res = new PhiFilter().filterRecord({ email: "a@b.com", attempts: 2 });
      expect(res).toEqual({ value: { email: "[REDACTED_EMAIL]", attempts: 2 }, found: true });
    });
  });

  describe("custom categories", () => {
    it("appends a category after the defaults", () => {
      const filter = new PhiFilter([
        ...DEFAULT_CATEGORIES,
        { name: "insuranceId", pattern: /\bINS-\d{8}\b/g },
      ]);

      expect(filter.categories.at(-1)).toBe("insuranceId");
      expect(filter.mask("policy INS-00412345")).toBe("policy [REDACTED_INSURANCEID]");
    });

    it.each([
      ["an invalid name", [{ name: "bad name", pattern: /x/g }]],
      ["a non-global pattern", [{ name: "plain", pattern: /x/ }]],
      [
        "a duplicate name",
        [
          { name: "dup", pattern: /x/g },
          { name: "dup", pattern: /y/g },
        ],
      ],
      ["a pattern that matches a token", [{ name: "redacted", pattern: /REDACTED/g }]],
    ])("rejects %s", (_label, categories) => {
      expect(() => new PhiFilter(categories)).toThrow(ConfigurationError);
    });
  });
});
