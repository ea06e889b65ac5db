import path from 'path';
import mammoth from 'mammoth';
import pdfParse from 'pdf-parse';
import WordExtractor from 'word-extractor';
import { cleanText, truncate } from './textCleaner';
import { ExtractionError, UnsupportedFormatError, describeError } from './errorHandler';
import { logger } from './logger';

export type DocumentFormat = 'pdf' | 'doc' | 'docx' | 'txt';

export const SUPPORTED_FORMATS: readonly DocumentFormat[] = ['pdf', 'doc', 'docx', 'txt'];

export interface UploadedDocument {
  buffer: Buffer;
  originalname: string;
  mimetype: string;
}

export interface ExtractedDocument {
  format: DocumentFormat;
  rawText: string;
  cleanedText: string;
  truncated: boolean;
}

export interface DocumentExtractorOptions {
  tikaUrl?: string;
  tikaTimeoutMs: number;
  maxDocumentChars: number;
}

const MIME_FORMATS: Record<string, DocumentFormat> = {
  'application/pdf': 'pdf',
  'application/msword': 'doc',
  'application/vnd.openxmlformats-officedocument.wordprocessingml.document': 'docx',
  'text/plain': 'txt'
};

const TIKA_MIME_TYPES: Record<DocumentFormat, string> = {
  pdf: 'application/pdf',
  doc: 'application/msword',
  docx: 'application/vnd.openxmlformats-officedocument.wordprocessingml.document',
  txt: 'text/plain'
};

const TIKA_UNAVAILABLE = 'Document parser is unavailable, try again later';

// In-process parsers; Tika, when configured, takes over if one of these throws.
const BINARY_PARSERS: Record<Exclude<DocumentFormat, 'txt'>, (buffer: Buffer) => Promise<string>> = {
  pdf: async buffer => (await pdfParse(buffer)).text,
  docx: async buffer => (await mammoth.extractRawText({ buffer })).value,
  doc: async buffer => (await new WordExtractor().extract(buffer)).getBody()
};

function isSupportedFormat(value: string): value is DocumentFormat {
  return SUPPORTED_FORMATS.some(format => format === value);
}

/**
 * Resolves the document format from the file extension, then from the MIME type.
 * Returns null when neither names a supported format.
 */
export function resolveFormat(originalname: string, mimetype: string): DocumentFormat | null {
  const extension = path.extname(originalname || '').slice(1).toLowerCase();
  if (extension) {
    return isSupportedFormat(extension) ? extension : null;
  }
  const baseMime = (mimetype || '').split(';')[0].trim().toLowerCase();
  return MIME_FORMATS[baseMime] ?? null;
}

export function decodePlainText(buffer: Buffer): string {
  try {
    return new TextDecoder('utf-8', { fatal: true }).decode(buffer);
  } catch {
    logger.warn('Text file is not valid UTF-8, decoding as latin1', { bytes: buffer.length });
    return buffer.toString('latin1');
  }
}

export class DocumentExtractor {
  constructor(private readonly options: DocumentExtractorOptions) {}

  async extract(file: UploadedDocument): Promise<ExtractedDocument> {
    const format = resolveFormat(file.originalname, file.mimetype);
    if (!format) {
      throw new UnsupportedFormatError(
        `Unsupported file type for "${file.originalname}". Supported formats: ${SUPPORTED_FORMATS.join(', ')}`
      );
    }

    if (file.buffer.length === 0) {
      throw new ExtractionError('Uploaded file is empty');
    }

    const rawText = await this.extractRaw(format, file);
    const cleaned = cleanText(rawText);

    if (cleaned.length === 0) {
      throw new ExtractionError('Could not extract any text from the file. It may be empty, scanned or password protected.');
    }

    const truncated = cleaned.length > this.options.maxDocumentChars;
    if (truncated) {
      logger.warn('Document truncated for analysis', {
        format,
        originalLength: cleaned.length,
        maxChars: this.options.maxDocumentChars
      });
    }

    return {
      format,
      rawText,
      cleanedText: truncate(cleaned, this.options.maxDocumentChars),
      truncated
    };
  }

  private async extractRaw(format: DocumentFormat, file: UploadedDocument): Promise<string> {
    if (format === 'txt') {
      return decodePlainText(file.buffer);
    }

    try {
      return await BINARY_PARSERS[format](file.buffer);
    } catch (error) {
      logger.warn('Document parser failed', { format, error: describeError(error) });
      if (!this.options.tikaUrl) {
        throw new ExtractionError(`Could not extract text from the .${format} file. It may be corrupt or password protected.`);
      }
      return this.extractWithTika(format, file.buffer, this.options.tikaUrl);
    }
  }

  private async extractWithTika(format: DocumentFormat, buffer: Buffer, tikaUrl: string): Promise<string> {
    // The timeout also covers reading the body.
    const signal = AbortSignal.timeout(this.options.tikaTimeoutMs);

    let response: Response;
    try {
      response = await fetch(`${tikaUrl.replace(/\/+$/, '')}/tika`, {
        method: 'PUT',
        headers: {
          Accept: 'text/plain; charset=UTF-8',
          'Content-Type': TIKA_MIME_TYPES[format]
        },
        body: new Uint8Array(buffer),
        signal
      });
    } catch (error) {
      logger.error('Document parser service unreachable', { format, error: describeError(error) });
      throw new ExtractionError(TIKA_UNAVAILABLE);
    }

    if (!response.ok) {
      logger.warn('Document parser rejected file', { format, status: response.status });
      throw new ExtractionError(`Could not extract text from the .${format} file. It may be corrupt or password protected.`);
    }

    try {
      return await response.text();
    } catch (error) {
      logger.error('Document parser response failed', { format, error: describeError(error) });
      throw new ExtractionError(TIKA_UNAVAILABLE);
    }
  }
}
