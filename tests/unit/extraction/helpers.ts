/**
 * Shared helpers for extraction engine tests
 *
 * @module tests/unit/extraction/helpers
 */

import type { Page, RawTable } from '../../../src/models/page.js';
import { pageFromData } from '../../../src/models/page.js';
import {
  resolveEngineConfig,
  type EngineConfig,
} from '../../../src/services/extraction/config.js';
import type { ExtractionLogger } from '../../../src/services/extraction/logger.js';

/** Page from tables and optional text */
export function page(tables: RawTable[], text = ''): Page {
  return pageFromData({ tables, text });
}

/** Page whose only content is banner text */
export function textPage(text: string): Page {
  return pageFromData({ tables: [], text });
}

/** Six-cell LGA row carrying its first ward: name, code, ward, -, -, ward code */
export function lgaRow(name: string, code: string, ward: string, wardCode: string): string[] {
  return [name, code, ward, '', '', wardCode];
}

/** Ward-only continuation row */
export function wardRow(ward: string, wardCode: string): Array<string | null> {
  return [null, null, ward, '', '', wardCode];
}

/** Resolved config with a small two-entry reference list unless overridden */
export function testConfig(overrides: Partial<EngineConfig> = {}): EngineConfig {
  return resolveEngineConfig({
    referenceLevel1: ['ALPHA', 'BETA'],
    level1Aliases: {},
    ...overrides,
  });
}

export interface RecordingLogger extends ExtractionLogger {
  messages: Array<{ level: 'debug' | 'info' | 'warn'; message: string }>;
  warnings(): string[];
}

/** Logger keeping every message for assertions */
export function recordingLogger(): RecordingLogger {
  const messages: RecordingLogger['messages'] = [];
  return {
    messages,
    debug: (message) => messages.push({ level: 'debug', message }),
    info: (message) => messages.push({ level: 'info', message }),
    warn: (message) => messages.push({ level: 'warn', message }),
    warnings: () => messages.filter((m) => m.level === 'warn').map((m) => m.message),
  };
}
