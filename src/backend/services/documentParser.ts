/**
 * Text Extractor
 *
 * Turns raw document bytes into plain text plus page boundaries so that
 * chunks can be cited by page.
 *
 * Strategy pattern: each format has its own extractor behind the same
 * interface, picked by the declared format. Extraction is pure; it never
 * touches the index or the document registry.
 */

import * as chardet from 'chardet';
import * as iconv from 'iconv-lite';
import * as mammoth from 'mammoth';
import { CorruptDocumentError, UnsupportedFormatError } from '../errors';
import { DOCUMENT_FORMATS, DocumentFormat, ExtractedText, PageBoundary } from '../../shared/types';

/**
 * Interface for format extractors.
 */
export interface DocumentExtractor {
  extract(bytes: Buffer): Promise<ExtractedText>;
}

const PAGE_SEPARATOR = '\n\n';

/**
 * Joins per-page texts into one string and records where each page sits.
 * Pages are trimmed; the separator between two pages belongs to neither.
 */
export function assemblePages(pageTexts: string[]): { text: string; pages: PageBoundary[] } {
  const pages: PageBoundary[] = [];
  let text = '';

  pageTexts.forEach((raw, index) => {
    if (index > 0) {
      text += PAGE_SEPARATOR;
    }
    const page = raw.trim();
    pages.push({ pageNumber: index + 1, startOffset: text.length, endOffset: text.length + page.length });
    text += page;
  });

  return { text, pages };
}

// ============================================================================
// Encoding detection
// ============================================================================

function tryStrictUtf8(bytes: Buffer): string | undefined {
  try {
    return new TextDecoder('utf-8', { fatal: true }).decode(bytes);
  } catch {
    // Not valid UTF-8; the caller falls back to detection
    return undefined;
  }
}

function detectBom(bytes: Buffer): string | undefined {
  if (bytes.length >= 3 && bytes[0] === 0xef && bytes[1] === 0xbb && bytes[2] === 0xbf) {
    return 'UTF-8';
  }
  if (bytes.length >= 2 && bytes[0] === 0xff && bytes[1] === 0xfe) {
    return 'UTF-16LE';
  }
  if (bytes.length >= 2 && bytes[0] === 0xfe && bytes[1] === 0xff) {
    return 'UTF-16BE';
  }
  return undefined;
}

/**
 * Decodes text bytes: byte order mark first, then strict UTF-8, then
 * statistical detection. Text that still contains NUL characters is
 * treated as binary.
 */
export function decodeText(bytes: Buffer): { text: string; encoding: string } {
  let decoded: { text: string; encoding: string } | undefined;

  const bom = detectBom(bytes);
  if (bom) {
    decoded = { text: iconv.decode(bytes, bom), encoding: bom };
  } else {
    const utf8 = tryStrictUtf8(bytes);
    if (utf8 !== undefined) {
      decoded = { text: utf8, encoding: 'UTF-8' };
    }
  }

  if (!decoded) {
    const detected = chardet.detect(bytes);
    if (!detected || !iconv.encodingExists(detected)) {
      throw new CorruptDocumentError('Could not determine the text encoding of the document');
    }
    decoded = { text: iconv.decode(bytes, detected), encoding: detected };
  }

  if (decoded.text.includes('\u0000')) {
    throw new CorruptDocumentError('Document looks like binary data, not text', {
      details: { encoding: decoded.encoding },
    });
  }
  return decoded;
}

// ============================================================================
// Extractors
// ============================================================================

/**
 * Plain text. Form feeds mark page breaks of paginated text.
 */
export class PlainTextExtractor implements DocumentExtractor {
  async extract(bytes: Buffer): Promise<ExtractedText> {
    const { text, encoding } = decodeText(bytes);

    const pageTexts = text
      .replace(/\r\n/g, '\n')
      .split('\f')
      .map((page) => page.replace(/\n{3,}/g, '\n\n'));

    return { ...assemblePages(pageTexts), encoding };
  }
}

/**
 * Markdown. Syntax stays (headers and code blocks carry meaning), only
 * images and horizontal rules are stripped.
 */
export class MarkdownExtractor implements DocumentExtractor {
  async extract(bytes: Buffer): Promise<ExtractedText> {
    const { text, encoding } = decodeText(bytes);
    return { ...assemblePages([this.cleanMarkdown(text)]), encoding };
  }

  private cleanMarkdown(text: string): string {
    return (
      text
        .replace(/\r\n/g, '\n')
        // Keep alt text of images, it's often descriptive
        .replace(/!\[([^\]]*)\]\([^)]+\)/g, '$1')
        .replace(/^[-*_]{3,}\s*$/gm, '')
        .replace(/\n{3,}/g, '\n\n')
    );
  }
}

/**
 * PDF via pdf-parse.
 *
 * pdf-parse prefixes every page with a blank line. When splitting on those
 * gives exactly `numpages` pieces we keep the pages, otherwise (pages with
 * blank lines of their own) the whole text is one page.
 */
export class PdfExtractor implements DocumentExtractor {
  async extract(bytes: Buffer): Promise<ExtractedText> {
    try {
      // Dynamic import to handle the CommonJS module
      const pdfParse = await import('pdf-parse');
      const pdf = await pdfParse.default(bytes);

      const segments = pdf.text.split(PAGE_SEPARATOR);
      if (segments[0] === '') {
        segments.shift();
      }
      const pageTexts = segments.length === pdf.numpages ? segments : [pdf.text];
      return assemblePages(pageTexts);
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unknown error';
      throw new CorruptDocumentError(
        `Failed to parse PDF: ${message}. The file may be corrupted, password-protected, or contain only scanned images.`,
        { cause: error }
      );
    }
  }
}

/**
 * Word documents via mammoth. Only the raw text is kept.
 */
export class DocxExtractor implements DocumentExtractor {
  async extract(bytes: Buffer): Promise<ExtractedText> {
    let value: string;
    try {
      ({ value } = await mammoth.extractRawText({ buffer: bytes }));
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unknown error';
      throw new CorruptDocumentError(`Failed to parse DOCX: ${message}`, { cause: error });
    }
    return assemblePages([value.replace(/\n{3,}/g, '\n\n')]);
  }
}

const extractors: Record<DocumentFormat, DocumentExtractor> = {
  text: new PlainTextExtractor(),
  markdown: new MarkdownExtractor(),
  pdf: new PdfExtractor(),
  docx: new DocxExtractor(),
};

export function isDocumentFormat(value: string): value is DocumentFormat {
  return DOCUMENT_FORMATS.some((format) => format === value);
}

export function getExtractor(format: string): DocumentExtractor {
  if (!isDocumentFormat(format)) {
    throw new UnsupportedFormatError(format);
  }
  return extractors[format];
}

/**
 * Extracts text and page boundaries from document bytes of the declared format.
 */
export async function extract(bytes: Buffer, format: string): Promise<ExtractedText> {
  return getExtractor(format).extract(bytes);
}

/**
 * Detects document format from filename extension.
 * Returns undefined if the extension is not supported.
 */
export function detectDocumentFormat(filename: string): DocumentFormat | undefined {
  const ext = filename.toLowerCase().split('.').pop();

  switch (ext) {
    case 'md':
    case 'markdown':
      return 'markdown';
    case 'txt':
    case 'text':
      return 'text';
    case 'pdf':
      return 'pdf';
    case 'docx':
      return 'docx';
    default:
      return undefined;
  }
}

const FORMATS_BY_MEDIA_TYPE = new Map<string, DocumentFormat>([
  ['text/plain', 'text'],
  ['text/markdown', 'markdown'],
  ['text/x-markdown', 'markdown'],
  ['application/pdf', 'pdf'],
  ['application/vnd.openxmlformats-officedocument.wordprocessingml.document', 'docx'],
]);

/**
 * File extension written for each format when a name has to be made up.
 */
export const FORMAT_EXTENSIONS: Record<DocumentFormat, string> = {
  text: 'txt',
  markdown: 'md',
  pdf: 'pdf',
  docx: 'docx',
};

/**
 * Detects document format from a media type such as "application/pdf".
 * Parameters after ";" are ignored.
 */
export function formatForContentType(contentType: string | undefined): DocumentFormat | undefined {
  const mediaType = contentType?.split(';')[0]?.trim().toLowerCase();
  return mediaType ? FORMATS_BY_MEDIA_TYPE.get(mediaType) : undefined;
}
