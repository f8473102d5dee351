import { readFile, readdir, mkdtemp, rm } from 'fs/promises';
import { basename, join } from 'path';
import { tmpdir } from 'os';
import pdfParse from 'pdf-parse/lib/pdf-parse.js';
import { OcrResult, OcrPage, OcrError } from '../types/index.js';
import { LLMClient } from '../clients/llm.js';
import { createChildLogger } from '../utils/logger.js';
import { sanitizeText } from '../utils/text-sanitizer.js';

const logger = createChildLogger('pdf-processor');

// Below this many characters of native text the PDF is treated as scanned
export const MIN_TEXT_LENGTH = 50;

export type OcrModel = Pick<LLMClient, 'ocrToMarkdown'>;

const PAGE_IMAGE_NUMBER = /-(\d+)\.png$/;

function pageImageNumber(filename: string): number {
  const match = PAGE_IMAGE_NUMBER.exec(filename);
  return match ? Number.parseInt(match[1], 10) : 0;
}

/**
 * Split native PDF text on form feeds into sanitized, non-empty pages
 */
export function splitNativePages(text: string): OcrPage[] {
  const pages: OcrPage[] = [];

  text.split('\f').forEach((raw, index) => {
    const markdown = sanitizeText(raw);
    if (markdown.length > 0) {
      pages.push({ pageNumber: index + 1, markdown, confidence: 1.0 });
    }
  });

  return pages;
}

function toResult(filename: string, pages: OcrPage[], totalPages: number): OcrResult {
  return {
    filename,
    pages,
    fullMarkdown: pages.map((p) => `[Page: ${p.pageNumber}]\n\n${p.markdown}`).join('\n\n---\n\n'),
    totalPages,
  };
}

/**
 * Reads regulation PDFs as text pages, using native text where the PDF has
 * it and page OCR through the vision model otherwise
 */
export class PdfProcessor {
  private llm: OcrModel;

  constructor(llm: OcrModel) {
    this.llm = llm;
  }

  async process(filepath: string): Promise<OcrResult> {
    const filename = basename(filepath);
    logger.info({ filepath, filename }, 'Processing PDF');

    try {
      const pdfBuffer = await readFile(filepath);
      const pdfData = await pdfParse(pdfBuffer);
      const totalPages = pdfData.numpages;

      const pages = splitNativePages(pdfData.text);
      const textLength = pages.reduce((sum, page) => sum + page.markdown.length, 0);

      if (textLength >= MIN_TEXT_LENGTH) {
        logger.info({ totalPages, textLength }, 'Using native PDF text');
        return toResult(filename, pages, totalPages);
      }

      logger.info({ textLength }, 'Native text insufficient, switching to OCR');
      const ocrPages = await this.extractPagesWithOCR(filepath);

      logger.info({ extractedPages: ocrPages.length }, 'OCR extraction complete');
      return toResult(filename, ocrPages, totalPages);
    } catch (error) {
      logger.error({ error, filepath }, 'PDF processing failed');
      throw error;
    }
  }

  /**
   * Rasterise every page and OCR it. Any failed page aborts the document.
   */
  private async extractPagesWithOCR(filepath: string): Promise<OcrPage[]> {
    const outDir = await mkdtemp(join(tmpdir(), 'reg-ocr-'));

    try {
      // pdf-poppler checks the platform when loaded, so it is only loaded for scanned PDFs
      const { default: poppler } = await import('pdf-poppler');
      await poppler.convert(filepath, {
        format: 'png',
        out_dir: outDir,
        out_prefix: 'page',
        scale: 2048,
      });

      const imageFiles = (await readdir(outDir))
        .filter((f) => f.endsWith('.png'))
        .sort((a, b) => pageImageNumber(a) - pageImageNumber(b));

      logger.info({ imageCount: imageFiles.length }, 'PDF converted to images');

      const pages: OcrPage[] = [];
      for (const [index, imageFile] of imageFiles.entries()) {
        const pageNumber = index + 1;
        try {
          const image = await readFile(join(outDir, imageFile));
          const markdown = await this.llm.ocrToMarkdown(image.toString('base64'), 'image/png');
          pages.push({ pageNumber, markdown: sanitizeText(markdown), confidence: 0.95 });
          logger.debug({ pageNumber }, 'Page OCR complete');
        } catch (error) {
          throw new OcrError(`OCR failed on page ${pageNumber} of ${basename(filepath)}`, error);
        }
      }

      return pages;
    } finally {
      await rm(outDir, { recursive: true, force: true }).catch((error: unknown) => {
        logger.warn({ error, outDir }, 'Failed to remove OCR images');
      });
    }
  }
}

export function createPdfProcessor(llm: OcrModel): PdfProcessor {
  return new PdfProcessor(llm);
}
