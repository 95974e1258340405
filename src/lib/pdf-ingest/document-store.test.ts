import { describe, expect, it } from 'vitest';
import { DocumentStore } from './document-store';

function doc(documentId: string) {
  return { documentId, fileName: `${documentId}.pdf`, text: `text of ${documentId}`, createdAt: new Date(0) };
}

describe('DocumentStore', () => {
  it('returns stored documents by id', () => {
    const store = new DocumentStore();
    store.put(doc('a'));

    expect(store.get('a')?.text).toBe('text of a');
    expect(store.get('missing')).toBeUndefined();
  });

  it('evicts the least recently used document when full', () => {
    const store = new DocumentStore(2);
    store.put(doc('a'));
    store.put(doc('b'));
    store.get('a');
    store.put(doc('c'));

    expect(store.size).toBe(2);
    expect(store.get('b')).toBeUndefined();
    expect(store.get('a')).toBeDefined();
    expect(store.get('c')).toBeDefined();
  });

  it('replaces a document stored under the same id', () => {
    const store = new DocumentStore(2);
    store.put(doc('a'));
    store.put({ ...doc('a'), text: 'updated' });

    expect(store.size).toBe(1);
    expect(store.get('a')?.text).toBe('updated');
  });

  it('keeps at least one document', () => {
    const store = new DocumentStore(0);
    store.put(doc('a'));
    store.put(doc('b'));

    expect(store.size).toBe(1);
    expect(store.get('b')).toBeDefined();
  });
});
