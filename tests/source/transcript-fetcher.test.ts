import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';

// Use vi.hoisted to create mocks that can be referenced in vi.mock factories
const { mockGet, mockExtractFromHtml } = vi.hoisted(() => ({
  mockGet: vi.fn(),
  mockExtractFromHtml: vi.fn(),
}));

vi.mock('axios', () => ({
  default: {
    create: vi.fn().mockImplementation(() => ({ get: mockGet })),
    isAxiosError: (error: unknown) =>
      typeof error === 'object' && error !== null && 'isAxiosError' in error,
  },
}));

vi.mock('@extractus/article-extractor', () => ({
  extractFromHtml: mockExtractFromHtml,
}));

import {
  TranscriptFetcher,
  readTranscriptFile,
} from '../../src/services/source/transcript-fetcher.js';
import { TranscriptFetchError } from '../../src/services/validation/errors.js';

const PAGE =
  '<html><head><title>Debate &amp; More</title></head>' +
  '<body><p>EM:</p><p>Hello</p></body></html>';

describe('TranscriptFetcher', () => {
  let fetcher: TranscriptFetcher;

  beforeEach(() => {
    vi.clearAllMocks();
    fetcher = new TranscriptFetcher({ timeoutMs: 5000, userAgent: 'test-agent' });
  });

  it('should download a page and convert it to lines', async () => {
    mockGet.mockResolvedValue({ status: 200, data: PAGE });

    const result = await fetcher.fetchTranscript('https://example.com/debate');

    expect(mockGet).toHaveBeenCalledWith('https://example.com/debate');
    expect(result.source).toBe('https://example.com/debate');
    expect(result.title).toBe('Debate & More');
    expect(result.text).toBe('EM:\n\nHello');
    expect(mockExtractFromHtml).not.toHaveBeenCalled();
  });

  it('should narrow to the main article body when asked', async () => {
    mockGet.mockResolvedValue({ status: 200, data: PAGE });
    mockExtractFromHtml.mockResolvedValue({ title: 'Main', content: '<p>EM:</p><p>Hi</p>' });

    const result = await fetcher.fetchTranscript('https://example.com/debate', {
      extractMainContent: true,
    });

    expect(mockExtractFromHtml).toHaveBeenCalledWith(PAGE, 'https://example.com/debate');
    expect(result.title).toBe('Main');
    expect(result.text).toBe('EM:\n\nHi');
  });

  it('should fall back to the whole page when extraction finds nothing', async () => {
    mockGet.mockResolvedValue({ status: 200, data: PAGE });
    mockExtractFromHtml.mockResolvedValue(null);

    const result = await fetcher.fetchTranscript('https://example.com/debate', {
      extractMainContent: true,
    });

    expect(result.text).toBe('EM:\n\nHello');
  });

  it('should reject invalid URLs without a request', async () => {
    await expect(fetcher.fetchHtml('not a url')).rejects.toBeInstanceOf(TranscriptFetchError);
    expect(mockGet).not.toHaveBeenCalled();
  });

  it('should wrap HTTP failures with the upstream status', async () => {
    mockGet.mockRejectedValue(
      Object.assign(new Error('Request failed with status code 404'), {
        isAxiosError: true,
        response: { status: 404 },
      })
    );

    const error = await fetcher.fetchHtml('https://example.com/missing').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TranscriptFetchError);
    if (error instanceof TranscriptFetchError) {
      expect(error.status).toBe(404);
      expect(error.url).toBe('https://example.com/missing');
      expect(error.message).toBe(
        'Failed to fetch https://example.com/missing: Request failed with status code 404'
      );
    }
  });

  it('should leave the status unset for network errors', async () => {
    mockGet.mockRejectedValue(new Error('socket hang up'));

    const error = await fetcher.fetchHtml('https://example.com/debate').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TranscriptFetchError);
    if (error instanceof TranscriptFetchError) {
      expect(error.status).toBeUndefined();
    }
  });
});

describe('readTranscriptFile', () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'transcript-test-'));
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it('should return plain text files unchanged', async () => {
    const filePath = path.join(tmpDir, 'debate.txt');
    await fs.writeFile(filePath, 'EM:\nHello\n', 'utf-8');

    const result = await readTranscriptFile(filePath);

    expect(result.text).toBe('EM:\nHello\n');
    expect(result.title).toBe('debate.txt');
  });

  it('should convert HTML files to lines', async () => {
    const filePath = path.join(tmpDir, 'debate.html');
    await fs.writeFile(filePath, PAGE, 'utf-8');

    const result = await readTranscriptFile(filePath);

    expect(result.title).toBe('Debate & More');
    expect(result.text).toBe('EM:\n\nHello');
  });

  it('should raise a fetch error for missing files', async () => {
    await expect(readTranscriptFile(path.join(tmpDir, 'missing.txt'))).rejects.toBeInstanceOf(
      TranscriptFetchError
    );
  });
});
