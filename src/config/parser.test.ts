import { describe, expect, it } from 'vitest';
import fc from 'fast-check';
import { ConfigParseError, getDefaultConfig, parseConfig } from './parser.js';
import { DEFAULT_CONFIG } from './defaults.js';

describe('parseConfig', () => {
  describe('defaults', () => {
    it('should return defaults for empty input', () => {
      expect(parseConfig('')).toEqual(DEFAULT_CONFIG);
    });

    it('should default to null substitution and accepting TypeErrors', () => {
      const config = parseConfig('');
      expect(config.checker.absent_value).toBe('null');
      expect(config.checker.accept_type_errors).toBe(true);
      expect(config.checker.accepted_error_names).toEqual([]);
      expect(config.checker.exemption_markers).toEqual(['Nullable', 'optional', 'nullable-type']);
      expect(config.enumeration).toEqual({ nullable_tag: 'nullable', internal_tag: 'internal' });
      expect(config.logging.debug).toBe(false);
    });

    it('should not share default arrays between parses', () => {
      const first = parseConfig('');
      first.checker.exemption_markers.push('Mutated');
      expect(parseConfig('').checker.exemption_markers).not.toContain('Mutated');
      expect(getDefaultConfig().checker.exemption_markers).not.toContain('Mutated');
    });
  });

  describe('checker section', () => {
    it('should parse every checker field', () => {
      const config = parseConfig(`
[checker]
absent_value = "undefined"
accept_type_errors = false
accepted_error_names = ["NotImplementedError"]
exemption_markers = ["Nullable"]
`);

      expect(config.checker).toEqual({
        absent_value: 'undefined',
        accept_type_errors: false,
        accepted_error_names: ['NotImplementedError'],
        exemption_markers: ['Nullable'],
      });
    });

    it('should merge partial sections with defaults', () => {
      const config = parseConfig(`
[checker]
accept_type_errors = false
`);
      expect(config.checker.absent_value).toBe('null');
      expect(config.checker.accept_type_errors).toBe(false);
    });

    it('should reject unknown absent values', () => {
      expect(() =>
        parseConfig(`
[checker]
absent_value = "nothing"
`)
      ).toThrow("Invalid value for 'checker.absent_value': expected one of null, undefined, got 'nothing'");
    });

    it('should reject non-boolean accept_type_errors', () => {
      expect(() =>
        parseConfig(`
[checker]
accept_type_errors = "yes"
`)
      ).toThrow("Invalid type for 'checker.accept_type_errors': expected boolean, got string");
    });

    it('should reject a list given as a plain string', () => {
      expect(() =>
        parseConfig(`
[checker]
exemption_markers = "Nullable"
`)
      ).toThrow("Invalid type for 'checker.exemption_markers': expected array of strings, got string");
    });

    it('should reject non-string list entries with their index', () => {
      expect(() =>
        parseConfig(`
[checker]
exemption_markers = [["Nullable"]]
`)
      ).toThrow("Invalid type for 'checker.exemption_markers[0]': expected string, got object");
    });

    it('should reject blank list entries', () => {
      expect(() =>
        parseConfig(`
[checker]
accepted_error_names = [" "]
`)
      ).toThrow("Invalid value for 'checker.accepted_error_names[0]': must not be empty");
    });

    it('should reject a section that is not a table', () => {
      expect(() => parseConfig('checker = 3')).toThrow(
        "Invalid type for 'checker': expected table, got number"
      );
    });
  });

  describe('enumeration section', () => {
    it('should strip a leading @ from tag names', () => {
      const config = parseConfig(`
[enumeration]
nullable_tag = "@allowNull"
internal_tag = "package"
`);
      expect(config.enumeration).toEqual({ nullable_tag: 'allowNull', internal_tag: 'package' });
    });
  });

  describe('logging section', () => {
    it('should parse the debug flag', () => {
      expect(parseConfig('[logging]\ndebug = true').logging.debug).toBe(true);
    });
  });

  describe('syntax errors', () => {
    it('should wrap TOML syntax errors', () => {
      try {
        parseConfig('[checker\nabsent_value = ');
        expect.fail('parseConfig should have thrown');
      } catch (error) {
        expect(error).toBeInstanceOf(ConfigParseError);
        if (error instanceof ConfigParseError) {
          expect(error.message.startsWith('Invalid TOML syntax: ')).toBe(true);
          expect(error.cause).toBeInstanceOf(Error);
        }
      }
    });
  });

  describe('properties', () => {
    it('should round-trip any list of marker names', () => {
      const marker = fc
        .string({ minLength: 1, maxLength: 20 })
        .filter((s) => /^[A-Za-z][A-Za-z0-9_-]*$/.test(s));

      fc.assert(
        fc.property(fc.array(marker, { maxLength: 5 }), (markers) => {
          const list = markers.map((m) => `"${m}"`).join(', ');
          const config = parseConfig(`[checker]\nexemption_markers = [${list}]`);
          expect(config.checker.exemption_markers).toEqual(markers);
        })
      );
    });
  });
});
