import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { InMemoryCacheStore } from './cacheStore.js';
import { MockChatModel } from './chat.js';
import { EmbeddingClient, MockEmbeddingFunction } from './embedding.js';
import { InvalidQuestionError, NoDocumentError } from './errors.js';
import { fingerprint } from './fingerprint.js';
import { RagPipeline } from './pipeline.js';
import { PaperQaSession, SUMMARY_QUESTION } from './session.js';
import { textDocument } from './types.js';

vi.mock('mupdf', () => ({}));

const TEXT = 'abcdefghij'.repeat(30);
const NOW = new Date('2026-05-01T12:00:00.000Z');

function createSession() {
  const cacheStore = new InMemoryCacheStore();
  const chatModel = new MockChatModel('Forty-two.');
  const pipeline = new RagPipeline({
    embedder: new EmbeddingClient(new MockEmbeddingFunction(16), { dimension: 16 }),
    cacheStore,
    chatModel,
    chunkSize: 100,
    chunkOverlap: 20,
    retrievalK: 2,
  });
  const openDocument = vi.fn(async (filePath: string) => textDocument(filePath, TEXT, 7));
  const session = new PaperQaSession({ pipeline, cacheStore, openDocument, now: () => NOW });
  return { session, cacheStore, chatModel, openDocument };
}

describe('PaperQaSession', () => {
  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should process a document and describe it', async () => {
    const { session } = createSession();
    const info = await session.processDocument('/papers/attention.pdf');

    expect(info).toMatchObject({
      fileName: 'attention.pdf',
      filePath: '/papers/attention.pdf',
      fingerprint: fingerprint(TEXT),
      pageCount: 7,
      segmentCount: 4,
      fromCache: false,
      processedAt: '2026-05-01T12:00:00.000Z',
    });
    expect(session.getDocumentInfo()).toEqual(info);
  });

  it('should report a cache hit when the same content is processed again', async () => {
    const { session } = createSession();
    await session.processDocument('/papers/a.pdf');
    const again = await session.processDocument('/papers/copy-of-a.pdf');

    expect(again.fromCache).toBe(true);
    expect(again.pageCount).toBe(0);
    expect(session.getDocumentInfo()?.fileName).toBe('copy-of-a.pdf');
  });

  it('should answer questions about the current document', async () => {
    const { session, chatModel } = createSession();
    await session.processDocument('/papers/a.pdf');

    const result = await session.askQuestion('  What repeats?  ');
    expect(result.question).toBe('What repeats?');
    expect(result.answer).toBe('Forty-two.');
    expect(result.sources).toHaveLength(2);
    expect(result.sources[0]).toEqual({
      segmentIndex: expect.any(Number),
      score: expect.any(Number),
      text: expect.any(String),
    });
    expect(chatModel.prompts[0]).toContain('Question: What repeats?\nHelpful Answer:');
  });

  it('should summarise with the fixed summary question', async () => {
    const { session, chatModel } = createSession();
    await session.processDocument('/papers/a.pdf');

    const result = await session.summarize();
    expect(result.question).toBe(SUMMARY_QUESTION);
    expect(chatModel.prompts[0]).toContain(`Question: ${SUMMARY_QUESTION}\n`);
  });

  it('should retrieve passages without calling the chat model', async () => {
    const { session, chatModel } = createSession();
    await session.processDocument('/papers/a.pdf');

    await expect(session.retrieve('abc', 3)).resolves.toHaveLength(3);
    expect(chatModel.prompts).toEqual([]);
  });

  it('should require a document before answering', async () => {
    const { session } = createSession();
    await expect(session.askQuestion('Anything?')).rejects.toBeInstanceOf(NoDocumentError);
    await expect(session.summarize()).rejects.toBeInstanceOf(NoDocumentError);
  });

  it('should reject an empty question before looking for a document', async () => {
    const { session } = createSession();
    await expect(session.askQuestion('   ')).rejects.toBeInstanceOf(InvalidQuestionError);
  });

  it('should invalidate the current document by default', async () => {
    const { session } = createSession();
    await session.processDocument('/papers/a.pdf');
    expect(await session.listCachedFingerprints()).toEqual([fingerprint(TEXT)]);

    await expect(session.invalidateCache()).resolves.toBe(fingerprint(TEXT));
    expect(await session.listCachedFingerprints()).toEqual([]);
    // The in-memory index stays usable.
    await expect(session.askQuestion('Still there?')).resolves.toMatchObject({ answer: 'Forty-two.' });
  });

  it('should invalidate an explicit fingerprint without a current document', async () => {
    const { session } = createSession();
    await expect(session.invalidateCache('0'.repeat(64))).resolves.toBe('0'.repeat(64));
    await expect(session.invalidateCache()).rejects.toBeInstanceOf(NoDocumentError);
  });

  it('should forget the current document on reset', async () => {
    const { session } = createSession();
    await session.processDocument('/papers/a.pdf');
    session.reset();
    expect(session.getDocumentInfo()).toBeNull();
  });
});
