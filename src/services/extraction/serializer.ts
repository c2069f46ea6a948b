/**
 * Export JSON form of an extracted document
 *
 * Level1/Level2/Level3 serialize as states/lgas/wards:
 *
 *   { "states": [ { "name", "lgas": [ { "name", "code", "wards": [ { "name", "code" } ] } ] } ] }
 *
 * @module services/extraction/serializer
 */

import { z } from 'zod';
import type { ExtractedDocument } from '../../models/hierarchy.js';
import { ExtractionContext } from './context.js';
import { DocumentBuilder } from './document-builder.js';

export interface ExportedWard {
  name: string;
  code: string;
}

export interface ExportedLga {
  name: string;
  code: string;
  wards: ExportedWard[];
}

export interface ExportedState {
  name: string;
  lgas: ExportedLga[];
}

export interface ExportedDocument {
  states: ExportedState[];
}

const ExportedWardSchema = z.object({
  name: z.string().min(1),
  code: z.string().optional(),
});

const ExportedLgaSchema = z.object({
  name: z.string().min(1),
  code: z.string().optional(),
  wards: z.array(ExportedWardSchema).default([]),
});

const ExportedDocumentSchema = z.object({
  states: z.array(
    z.object({
      name: z.string().min(1),
      lgas: z.array(ExportedLgaSchema).default([]),
    })
  ),
});

export function toExportedDocument(document: ExtractedDocument): ExportedDocument {
  return {
    states: document.level1.map((level1) => ({
      name: level1.name,
      lgas: level1.level2.map((level2) => ({
        name: level2.name,
        code: level2.code,
        wards: level2.level3.map((level3) => ({ name: level3.name, code: level3.code })),
      })),
    })),
  };
}

export function serializeDocument(document: ExtractedDocument): string {
  return JSON.stringify(toExportedDocument(document), null, 2);
}

/**
 * Parse the export form back into a document. Entries are rebuilt through
 * the document builder, so names are normalized, missing codes regenerated
 * and duplicate entries collapsed.
 *
 * @throws SyntaxError for invalid JSON, ZodError for the wrong shape
 */
export function parseExportedDocument(json: unknown): ExtractedDocument {
  const raw: unknown = typeof json === 'string' ? JSON.parse(json) : json;
  const parsed = ExportedDocumentSchema.parse(raw);

  const builder = new DocumentBuilder(new ExtractionContext());
  for (const state of parsed.states) {
    const { entity: level1 } = builder.findOrCreateLevel1(state.name);
    for (const lga of state.lgas) {
      const { entity: level2 } = builder.findOrCreateLevel2(level1, lga.name, lga.code ?? null);
      for (const ward of lga.wards) {
        builder.findOrCreateLevel3(level2, ward.name, ward.code ?? null);
      }
    }
  }
  return builder.document;
}
