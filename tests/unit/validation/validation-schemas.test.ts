/**
 * Unit tests for input validation schemas and helpers
 *
 * @module tests/unit/validation/validation-schemas
 */

import { describe, it, expect, afterEach } from 'vitest';
import path from 'path';
import os from 'os';
import {
  ValidationError,
  validateInput,
  escapeLikePattern,
  sanitizePath,
  ColumnLayoutInput,
  DatabaseCreateInput,
  DatabaseDeleteInput,
  ExtractPagesInput,
  ExtractPdfInput,
  SearchInput,
} from '../../../src/utils/validation.js';

describe('validateInput', () => {
  it('returns parsed data with defaults applied', () => {
    const input = validateInput(ExtractPagesInput, { pages: [{}] });

    expect(input).toEqual({
      pages: [{ tables: [], text: '' }],
      filename: 'pages.json',
      save_to_db: false,
      save_to_json: false,
      include_document: true,
    });
  });

  it('joins field paths and messages', () => {
    expect(() => validateInput(ExtractPagesInput, { pages: [] })).toThrow(
      new ValidationError('pages: At least one page is required')
    );
  });

  it('uses the schema message for a bad database name', () => {
    expect(() => validateInput(DatabaseCreateInput, { name: 'has space' })).toThrow(
      'name: Database name must contain only alphanumeric characters, underscores, and hyphens'
    );
  });

  it('requires confirm=true to delete', () => {
    expect(() =>
      validateInput(DatabaseDeleteInput, { database_name: 'boundaries', confirm: false })
    ).toThrow('confirm: Confirm must be true to delete database');
  });
});

describe('extraction schemas', () => {
  it('defaults a PDF run to saving both outputs without the document', () => {
    expect(validateInput(ExtractPdfInput, { file_path: '/tmp/a.pdf' })).toEqual({
      file_path: '/tmp/a.pdf',
      save_to_db: true,
      save_to_json: true,
      include_document: false,
    });
  });

  it('accepts null cells and a null reference list', () => {
    const input = validateInput(ExtractPagesInput, {
      pages: [{ tables: [[[null, 'Eziama']]], text: 'ALPHA' }],
      reference_states: null,
    });

    expect(input.pages[0].tables).toEqual([[[null, 'Eziama']]]);
    expect(input.reference_states).toBeNull();
  });

  it('takes the named layout or four column indexes', () => {
    expect(validateInput(ColumnLayoutInput, 'lga_ward_six_column')).toBe('lga_ward_six_column');
    expect(() =>
      validateInput(ColumnLayoutInput, { level2_name: 0, level2_code: 1, level3_name: 2 })
    ).toThrow(ValidationError);
  });

  it('trims search queries before the length check', () => {
    expect(validateInput(SearchInput, { query: '  ab  ' })).toEqual({ query: 'ab', type: 'all' });
    expect(() => validateInput(SearchInput, { query: ' a ' })).toThrow(
      'query: Query must be at least 2 characters'
    );
  });
});

describe('escapeLikePattern', () => {
  it('escapes wildcards and the escape character', () => {
    expect(escapeLikePattern('a_b%c\\d')).toBe('a\\_b\\%c\\\\d');
  });
});

describe('sanitizePath', () => {
  const originalAllowed = process.env.BOUNDARY_EXTRACTOR_ALLOWED_DIRS;

  afterEach(() => {
    if (originalAllowed === undefined) {
      delete process.env.BOUNDARY_EXTRACTOR_ALLOWED_DIRS;
    } else {
      process.env.BOUNDARY_EXTRACTOR_ALLOWED_DIRS = originalAllowed;
    }
  });

  it('resolves paths inside the allowed directories', () => {
    const base = path.join(os.tmpdir(), 'boundary-extract-allowed');
    expect(sanitizePath(path.join(base, 'x', '..', 'a.pdf'), [base])).toBe(
      path.join(base, 'a.pdf')
    );
  });

  it('rejects paths escaping the allowed directories', () => {
    const base = path.join(os.tmpdir(), 'boundary-extract-allowed');
    expect(() => sanitizePath(path.join(base, '..', 'other.pdf'), [base])).toThrow(
      'is outside allowed directories'
    );
  });

  it('rejects null bytes', () => {
    expect(() => sanitizePath('/tmp/a\0.pdf')).toThrow('Path contains null bytes');
  });

  it('extends the defaults with BOUNDARY_EXTRACTOR_ALLOWED_DIRS', () => {
    process.env.BOUNDARY_EXTRACTOR_ALLOWED_DIRS = '/srv/boundaries, /srv/extra';
    expect(sanitizePath('/srv/extra/a.pdf')).toBe('/srv/extra/a.pdf');
  });
});
