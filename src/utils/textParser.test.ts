import fs from 'fs';
import path from 'path';
import { ReadableStream } from 'stream/web';
import { ExtractionError, UnsupportedFormatError } from './errorHandler';
import { decodePlainText, DocumentExtractor, resolveFormat } from './textParser';

const mockWordExtract = jest.fn();
jest.mock('word-extractor', () => class {
  extract = (source: Buffer) => mockWordExtract(source);
});

function fixture(name: string) {
  return fs.readFileSync(path.join(__dirname, '__fixtures__', name));
}

function txt(content: string | Buffer, originalname = 'cv.txt') {
  return {
    buffer: typeof content === 'string' ? Buffer.from(content, 'utf-8') : content,
    originalname,
    mimetype: 'text/plain'
  };
}

describe('resolveFormat', () => {
  it('prefers the file extension', () => {
    expect(resolveFormat('CV.PDF', '')).toBe('pdf');
    expect(resolveFormat('resume.odt', 'application/pdf')).toBeNull();
  });

  it('falls back to the MIME type when there is no extension', () => {
    expect(resolveFormat('upload', 'application/vnd.openxmlformats-officedocument.wordprocessingml.document')).toBe('docx');
    expect(resolveFormat('upload', 'text/plain; charset=utf-8')).toBe('txt');
    expect(resolveFormat('upload', 'image/png')).toBeNull();
  });
});

describe('decodePlainText', () => {
  it('decodes UTF-8', () => {
    expect(decodePlainText(Buffer.from('Café', 'utf-8'))).toBe('Café');
  });

  it('falls back to latin1 for invalid UTF-8', () => {
    expect(decodePlainText(Buffer.from([0x43, 0x61, 0x66, 0xe9]))).toBe('Café');
  });
});

describe('DocumentExtractor', () => {
  const extractor = new DocumentExtractor({ tikaTimeoutMs: 1000, maxDocumentChars: 50 });
  const withTika = new DocumentExtractor({ tikaUrl: 'http://tika.test:9998/', tikaTimeoutMs: 1000, maxDocumentChars: 1000 });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('extracts and cleans plain text', async () => {
    const result = await extractor.extract(txt('Jane Doe\nPython developer'));

    expect(result).toEqual({
      format: 'txt',
      rawText: 'Jane Doe\nPython developer',
      cleanedText: 'Jane Doe Python developer',
      truncated: false
    });
  });

  it('rejects unsupported formats before parsing', async () => {
    const fetchSpy = jest.spyOn(globalThis, 'fetch');

    await expect(withTika.extract({ buffer: Buffer.from('%PNG'), originalname: 'photo.png', mimetype: 'image/png' }))
      .rejects.toBeInstanceOf(UnsupportedFormatError);
    expect(fetchSpy).not.toHaveBeenCalled();
  });

  it('rejects empty files', async () => {
    await expect(extractor.extract(txt(Buffer.alloc(0)))).rejects.toThrow('Uploaded file is empty');
  });

  it('rejects files with no usable text', async () => {
    await expect(extractor.extract(txt('*** ~~~ ^^^'))).rejects.toBeInstanceOf(ExtractionError);
  });

  it('truncates long documents', async () => {
    const result = await extractor.extract(txt('word '.repeat(20)));

    expect(result.truncated).toBe(true);
    expect(result.cleanedText).toHaveLength(50);
  });

  it('extracts text from a PDF', async () => {
    const result = await extractor.extract({ buffer: fixture('cv.pdf'), originalname: 'cv.pdf', mimetype: 'application/pdf' });

    expect(result.format).toBe('pdf');
    expect(result.cleanedText).toBe('Jane Doe Python Developer');
  });

  it('extracts text from a DOCX file', async () => {
    const result = await extractor.extract({ buffer: fixture('cv.docx'), originalname: 'cv.docx', mimetype: '' });

    expect(result.format).toBe('docx');
    expect(result.cleanedText).toBe('Jane Doe Project Manager');
  });

  it('extracts the body of a DOC file', async () => {
    mockWordExtract.mockResolvedValueOnce({ getBody: () => 'Jane Doe\nAccountant' });

    const result = await extractor.extract({ buffer: Buffer.from('DOC'), originalname: 'cv.doc', mimetype: '' });

    expect(result.cleanedText).toBe('Jane Doe Accountant');
    expect(mockWordExtract).toHaveBeenCalledWith(Buffer.from('DOC'));
  });

  it('fails on unreadable PDFs when no document parser service is configured', async () => {
    await expect(extractor.extract({ buffer: Buffer.from('This is not a PDF'), originalname: 'cv.pdf', mimetype: 'application/pdf' }))
      .rejects.toThrow('Could not extract text from the .pdf file. It may be corrupt or password protected.');
  });

  it('falls back to Tika for unreadable PDFs', async () => {
    const fetchSpy = jest.spyOn(globalThis, 'fetch').mockResolvedValue(new Response('Recovered CV text'));

    const result = await withTika.extract({ buffer: Buffer.from('This is not a PDF'), originalname: 'cv.pdf', mimetype: 'application/pdf' });

    expect(result.cleanedText).toBe('Recovered CV text');
    expect(fetchSpy).toHaveBeenCalledWith('http://tika.test:9998/tika', expect.objectContaining({ method: 'PUT' }));
  });

  it('falls back to Tika for unreadable DOCX files', async () => {
    jest.spyOn(globalThis, 'fetch').mockResolvedValue(new Response('Project Manager\nLeadership'));

    const result = await withTika.extract({ buffer: Buffer.from('PK'), originalname: 'cv.docx', mimetype: '' });

    expect(result).toEqual({
      format: 'docx',
      rawText: 'Project Manager\nLeadership',
      cleanedText: 'Project Manager Leadership',
      truncated: false
    });
  });

  it('reports Tika rejections as extraction errors', async () => {
    mockWordExtract.mockRejectedValueOnce(new Error('Unable to read this type of file'));
    jest.spyOn(globalThis, 'fetch').mockResolvedValue(new Response('', { status: 422 }));

    await expect(withTika.extract({ buffer: Buffer.from('DOC'), originalname: 'cv.doc', mimetype: '' }))
      .rejects.toThrow('Could not extract text from the .doc file. It may be corrupt or password protected.');
  });

  it('reports an unreachable Tika server as unavailable', async () => {
    jest.spyOn(globalThis, 'fetch').mockRejectedValue(new TypeError('fetch failed'));

    await expect(withTika.extract({ buffer: Buffer.from('PK'), originalname: 'cv.docx', mimetype: '' }))
      .rejects.toThrow(new ExtractionError('Document parser is unavailable, try again later'));
  });

  it('reports a Tika response that breaks mid-body as unavailable', async () => {
    const broken = new ReadableStream<Uint8Array>({
      start(controller) {
        controller.error(new Error('socket hang up'));
      }
    });
    jest.spyOn(globalThis, 'fetch').mockResolvedValue(new Response(broken));

    const extraction = withTika.extract({ buffer: Buffer.from('PK'), originalname: 'cv.docx', mimetype: '' });

    await expect(extraction).rejects.toBeInstanceOf(ExtractionError);
    await expect(extraction).rejects.toThrow('Document parser is unavailable, try again later');
  });
});
