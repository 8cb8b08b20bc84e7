import { describe, it, expect } from 'vitest';
import { BackendError, CancelledError, ValidationError } from '../../core/errors.js';
import { createInMemoryVectorIndex } from '../vector_index.js';

function vec(...values: number[]): Float32Array {
  return Float32Array.from(values);
}

describe('InMemoryVectorIndex', () => {
  it('should return nearest documents by cosine similarity', async () => {
    const index = createInMemoryVectorIndex();
    index.add({ docId: 'doc1', embedding: vec(1, 0), content: 'east' });
    index.add({ docId: 'doc2', embedding: vec(0, 1) });
    index.add({ docId: 'doc3', embedding: vec(1, 1) });

    const hits = await index.query(vec(1, 0), 2);
    expect(hits.map((hit) => hit.docId)).toEqual(['doc1', 'doc3']);
    expect(hits[0]?.score).toBe(1);
    expect(hits[0]?.content).toBe('east');
    expect(hits[0]?.contentRef).toBe('doc1');
  });

  it('should break score ties by docId', async () => {
    const index = createInMemoryVectorIndex();
    index.add({ docId: 'b', embedding: vec(1, 0) });
    index.add({ docId: 'a', embedding: vec(1, 0) });

    const hits = await index.query(vec(1, 0), 5);
    expect(hits.map((hit) => hit.docId)).toEqual(['a', 'b']);
  });

  it('should apply metadata filters', async () => {
    const index = createInMemoryVectorIndex();
    index.add({ docId: 'en', embedding: vec(1, 0), metadata: { lang: 'en' } });
    index.add({ docId: 'de', embedding: vec(1, 0), metadata: { lang: 'de' } });

    const hits = await index.query(vec(1, 0), 5, { lang: 'de' });
    expect(hits.map((hit) => hit.docId)).toEqual(['de']);
  });

  it('should reject unknown filter fields and bad dimensions as invalid input', async () => {
    const index = createInMemoryVectorIndex();
    index.add({ docId: 'doc1', embedding: vec(1, 0), metadata: { lang: 'en' } });

    await expect(index.query(vec(1, 0), 5, { color: 'red' })).rejects.toMatchObject({
      kind: 'invalid_input',
      message: 'Backend vector-index invalid_input: unknown filter field(s): color',
    });
    await expect(index.query(vec(1, 0, 0), 5)).rejects.toBeInstanceOf(BackendError);
    await expect(index.query(vec(1, 0), 0)).rejects.toBeInstanceOf(BackendError);
  });

  it('should enforce one dimension on insert', () => {
    const index = createInMemoryVectorIndex();
    index.add({ docId: 'doc1', embedding: vec(1, 0) });
    expect(() => index.add({ docId: 'doc2', embedding: vec(1, 0, 0) })).toThrow(ValidationError);
  });

  it('should return copies of stored embeddings', async () => {
    const index = createInMemoryVectorIndex();
    index.add({ docId: 'doc1', embedding: vec(1, 0) });
    const [hit] = await index.query(vec(1, 0), 1);
    if (hit?.embedding instanceof Float32Array) hit.embedding[0] = 9;

    const [again] = await index.query(vec(1, 0), 1);
    expect(again?.embedding?.[0]).toBe(1);
  });

  it('should honour an aborted signal', async () => {
    const index = createInMemoryVectorIndex();
    const controller = new AbortController();
    controller.abort();
    await expect(index.query(vec(1, 0), 1, {}, { signal: controller.signal })).rejects.toBeInstanceOf(CancelledError);
  });

  it('should support remove and clear', () => {
    const index = createInMemoryVectorIndex();
    index.add({ docId: 'doc1', embedding: vec(1, 0) });
    index.add({ docId: 'doc2', embedding: vec(0, 1) });

    expect(index.remove('doc1')).toBe(true);
    expect(index.size()).toBe(1);
    index.clear();
    expect(index.size()).toBe(0);
    expect(() => index.add({ docId: 'doc3', embedding: vec(1, 0, 0) })).not.toThrow();
  });
});
