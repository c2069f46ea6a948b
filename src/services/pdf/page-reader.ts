/**
 * PDF page reader
 *
 * Reads a PDF with pdfjs-dist (legacy build, which runs under Node) and
 * yields one Page per PDF page, lazily and in document order. Layout
 * reconstruction from positioned text lives in ./layout.ts.
 *
 * CRITICAL: NEVER use console.log() - stdout is JSON-RPC protocol.
 *
 * @module services/pdf/page-reader
 */

import fs from 'fs';
import path from 'path';
import { fileURLToPath, pathToFileURL } from 'url';
import { getDocument, GlobalWorkerOptions } from 'pdfjs-dist/legacy/build/pdf.mjs';
import { pageFromData, type Page } from '../../models/page.js';
import { UnreadableSourceError } from '../extraction/errors.js';
import { DEFAULT_LAYOUT_OPTIONS, layoutPage, type LayoutOptions, type PositionedText } from './layout.js';

const __dirname = path.dirname(fileURLToPath(import.meta.url));

/** Reads a source into pages; injectable so callers can be tested without PDFs */
export type PageReader = (
  source: string | Uint8Array,
  options?: Partial<LayoutOptions>
) => AsyncIterable<Page>;

let workerConfigured = false;

function configurePdfJsWorker(): void {
  if (workerConfigured) return;
  workerConfigured = true;

  const candidatePaths = [
    path.join(process.cwd(), 'node_modules/pdfjs-dist/legacy/build/pdf.worker.mjs'),
    path.resolve(__dirname, '..', '..', '..', 'node_modules/pdfjs-dist/legacy/build/pdf.worker.mjs'),
  ];
  const resolvedPath = candidatePaths.find((candidate) => fs.existsSync(candidate));
  if (resolvedPath) {
    GlobalWorkerOptions.workerSrc = pathToFileURL(resolvedPath).href;
  }
}

async function loadBytes(source: string | Uint8Array): Promise<Uint8Array> {
  if (typeof source !== 'string') {
    return source;
  }
  try {
    // pdfjs rejects Buffer instances; hand it a plain Uint8Array
    return new Uint8Array(await fs.promises.readFile(source));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new UnreadableSourceError(`Cannot read file ${source}: ${message}`, null, error);
  }
}

/**
 * Yield the pages of a PDF in order
 *
 * @throws UnreadableSourceError when the file cannot be read or parsed
 */
export async function* readPdfPages(
  source: string | Uint8Array,
  options: Partial<LayoutOptions> = {}
): AsyncGenerator<Page> {
  configurePdfJsWorker();
  const layoutOptions: LayoutOptions = { ...DEFAULT_LAYOUT_OPTIONS, ...options };
  const data = await loadBytes(source);

  const loadingTask = getDocument({
    data,
    useSystemFonts: true,
    disableFontFace: true,
    isEvalSupported: false,
  });

  try {
    const pdf = await loadingTask.promise.catch((error: unknown) => {
      const message = error instanceof Error ? error.message : String(error);
      throw new UnreadableSourceError(`Cannot parse PDF: ${message}`, null, error);
    });

    console.error(`[PdfReader] ${pdf.numPages} page(s)`);

    for (let pageNumber = 1; pageNumber <= pdf.numPages; pageNumber++) {
      const fragments: PositionedText[] = [];
      try {
        const page = await pdf.getPage(pageNumber);
        try {
          const textContent = await page.getTextContent();
          for (const item of textContent.items) {
            if (!('str' in item) || !item.str.trim()) {
              continue;
            }
            fragments.push({
              text: item.str,
              x: Number(item.transform[4]),
              y: Number(item.transform[5]),
              width: item.width,
            });
          }
        } finally {
          page.cleanup();
        }
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        throw new UnreadableSourceError(
          `Cannot read page ${pageNumber}: ${message}`,
          pageNumber,
          error
        );
      }

      yield pageFromData(layoutPage(fragments, layoutOptions));
    }
  } finally {
    await loadingTask.destroy();
  }
}
