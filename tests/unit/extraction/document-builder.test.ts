/**
 * Unit tests for DocumentBuilder find-or-create insertion
 *
 * @module tests/unit/extraction/document-builder
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { ExtractionContext } from '../../../src/services/extraction/context.js';
import { DocumentBuilder } from '../../../src/services/extraction/document-builder.js';
import { generateCode } from '../../../src/services/extraction/normalize.js';

describe('DocumentBuilder', () => {
  let builder: DocumentBuilder;

  beforeEach(() => {
    builder = new DocumentBuilder(new ExtractionContext());
  });

  it('normalizes Level1 names and returns the existing entity on repeat', () => {
    const first = builder.findOrCreateLevel1('  alpha ');
    const second = builder.findOrCreateLevel1('ALPHA');

    expect(first.created).toBe(true);
    expect(first.entity.name).toBe('ALPHA');
    expect(second.created).toBe(false);
    expect(second.entity).toBe(first.entity);
    expect(builder.document.level1).toHaveLength(1);
  });

  it('keys Level2 by parent, name and code', () => {
    const { entity: alpha } = builder.findOrCreateLevel1('ALPHA');
    const { entity: beta } = builder.findOrCreateLevel1('BETA');

    builder.findOrCreateLevel2(alpha, 'Aba North', '01');
    expect(builder.findOrCreateLevel2(alpha, 'ABA  NORTH', '01').created).toBe(false);
    expect(builder.findOrCreateLevel2(alpha, 'Aba North', '02').created).toBe(true);
    expect(builder.findOrCreateLevel2(beta, 'Aba North', '01').created).toBe(true);

    expect(alpha.level2.map((l) => `${l.name}/${l.code}`)).toEqual(['ABA NORTH/01', 'ABA NORTH/02']);
    expect(beta.level2).toHaveLength(1);
  });

  it('generates a code from initials when none is given', () => {
    const { entity: alpha } = builder.findOrCreateLevel1('ALPHA');
    const { entity } = builder.findOrCreateLevel2(alpha, 'Aba North', null);

    expect(entity.code).toBe('AN');
    expect(builder.hasLevel2(alpha, 'aba north', '')).toBe(true);
  });

  it('dedups Level3 within its parent only', () => {
    const { entity: alpha } = builder.findOrCreateLevel1('ALPHA');
    const { entity: first } = builder.findOrCreateLevel2(alpha, 'Aba North', '01');
    const { entity: second } = builder.findOrCreateLevel2(alpha, 'Aba South', '02');

    expect(builder.findOrCreateLevel3(first, 'Ariaria', '001').created).toBe(true);
    expect(builder.findOrCreateLevel3(first, 'ariaria', '001').created).toBe(false);
    expect(builder.findOrCreateLevel3(second, 'Ariaria', '001').created).toBe(true);

    expect(first.level3).toEqual([{ name: 'ARIARIA', code: '001' }]);
    expect(second.level3).toEqual([{ name: 'ARIARIA', code: '001' }]);
  });

  it('rejects a Level2 it did not create', () => {
    expect(() => builder.findOrCreateLevel3({ name: 'X', code: '1', level3: [] }, 'Ward', '1')).toThrow(
      'Level2 "X" was not created by this builder'
    );
  });
});

describe('generateCode', () => {
  it('joins word initials', () => {
    expect(generateCode('North East')).toBe('NE');
    expect(generateCode('ifako-ijaiye')).toBe('II');
  });

  it('falls back to XX for names without words', () => {
    expect(generateCode('--')).toBe('XX');
    expect(generateCode('')).toBe('XX');
  });
});
