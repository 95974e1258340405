import { beforeEach, describe, expect, it, vi } from 'vitest';
import { NextRequest } from 'next/server';
import { IngestError } from '@/lib/pdf-ingest/errors';
import { GET, POST } from './route';

const mocks = vi.hoisted(() => ({
  ingest: vi.fn(),
  maxFileSizeBytes: 1024 * 1024,
}));

vi.mock('@/lib/pdf-ingest/singleton', () => ({
  getIngestConfig: () => ({ maxFileSizeBytes: mocks.maxFileSizeBytes }),
  getIngestPipeline: () => ({ ingest: mocks.ingest }),
}));

function upload(file?: File): NextRequest {
  const form = new FormData();
  if (file) {
    form.append('file', file);
  }
  return new NextRequest('http://localhost/api/ingest', { method: 'POST', body: form });
}

const PDF_BYTES = '%PDF-1.7\n% test\n';

describe('POST /api/ingest', () => {
  beforeEach(() => {
    vi.restoreAllMocks();
    mocks.ingest.mockReset();
  });

  it('rejects requests that are not multipart', async () => {
    const request = new NextRequest('http://localhost/api/ingest', {
      method: 'POST',
      headers: { 'content-type': 'application/json' },
      body: '{}',
    });

    const response = await POST(request);

    expect(response.status).toBe(415);
    expect(await response.json()).toEqual({ error: 'Invalid content type. Expected multipart/form-data.' });
  });

  it('requires a file field', async () => {
    const response = await POST(upload());

    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({
      error: "No file provided. Upload a PDF using the 'file' form field.",
    });
  });

  it('rejects files over the size limit', async () => {
    const file = new File([new Uint8Array(2 * 1024 * 1024)], 'big.pdf', { type: 'application/pdf' });

    const response = await POST(upload(file));

    expect(response.status).toBe(413);
    expect(await response.json()).toEqual({ error: 'File exceeds the 1 MB limit (2.0 MB).' });
    expect(mocks.ingest).not.toHaveBeenCalled();
  });

  it('leaves the PDF check to the file content', async () => {
    mocks.ingest.mockRejectedValue(new IngestError('notes.txt is not a PDF file.'));

    const response = await POST(upload(new File(['hello'], 'notes.txt', { type: 'text/plain' })));

    expect(mocks.ingest).toHaveBeenCalledTimes(1);
    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({ error: 'notes.txt is not a PDF file.' });
  });

  it('accepts a PDF sent as application/x-pdf without a .pdf name', async () => {
    mocks.ingest.mockResolvedValue({
      documentId: 'doc-2',
      fileName: 'scan',
      text: '',
      parser: 'pdf-parse',
      features: { language: 'Unknown', hasTables: false, hasImages: false },
      transformAvailable: false,
      pageImages: [],
      embeddedImages: [],
      savedImagePaths: [],
    });

    const response = await POST(upload(new File([PDF_BYTES], 'scan', { type: 'application/x-pdf' })));

    expect(response.status).toBe(200);
    const [buffer, fileName] = mocks.ingest.mock.calls[0];
    expect(buffer.toString()).toBe(PDF_BYTES);
    expect(fileName).toBe('scan');
  });

  it('returns the ingestion report with base64 images', async () => {
    mocks.ingest.mockResolvedValue({
      documentId: 'doc-1',
      fileName: 'report.pdf',
      text: 'Hello',
      parser: 'pdf-parse',
      pageCount: 1,
      features: { language: 'en', hasTables: false, hasImages: false },
      transformAvailable: false,
      transformUnavailableReason: 'OPENAI_API_KEY is not set.',
      pageImages: [{ fileName: 'page_1_aaaaaaaa.jpg', page: 1, mimeType: 'image/jpeg', data: Buffer.from('jpg') }],
      embeddedImages: [],
      savedImagePaths: [],
    });

    const response = await POST(upload(new File([PDF_BYTES], 'report.pdf', { type: 'application/pdf' })));

    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({
      document: {
        documentId: 'doc-1',
        fileName: 'report.pdf',
        parser: 'pdf-parse',
        pageCount: 1,
        parseError: null,
        textLength: 5,
        text: 'Hello',
        features: { language: 'en', hasTables: false, hasImages: false },
        transformAvailable: false,
        transformUnavailableReason: 'OPENAI_API_KEY is not set.',
      },
      pageImages: [{ fileName: 'page_1_aaaaaaaa.jpg', page: 1, mimeType: 'image/jpeg', data: 'anBn' }],
      embeddedImages: [],
      savedImagePaths: [],
    });

    const [buffer, fileName] = mocks.ingest.mock.calls[0];
    expect(Buffer.isBuffer(buffer)).toBe(true);
    expect(buffer.toString()).toBe(PDF_BYTES);
    expect(fileName).toBe('report.pdf');
  });

  it('accepts a .pdf upload sent as octet-stream', async () => {
    mocks.ingest.mockRejectedValue(new IngestError('scan.pdf is not a PDF file.'));

    const response = await POST(upload(new File(['not really'], 'scan.pdf', { type: 'application/octet-stream' })));

    expect(mocks.ingest).toHaveBeenCalledTimes(1);
    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({ error: 'scan.pdf is not a PDF file.' });
  });

  it('maps unexpected failures to 500', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    mocks.ingest.mockRejectedValue(new Error('disk full'));

    const response = await POST(upload(new File([PDF_BYTES], 'a.pdf', { type: 'application/pdf' })));

    expect(response.status).toBe(500);
    expect(await response.json()).toEqual({ error: 'disk full' });
  });
});

describe('GET /api/ingest', () => {
  it('explains how to call the endpoint', async () => {
    const response = await GET();

    expect(response.status).toBe(405);
    const body = await response.json();
    expect(body.error).toBe('Method not allowed. Use POST with multipart/form-data.');
    expect(body.usage.path).toBe('/api/ingest');
  });
});
