import type { StoredDocument } from "./types";

/**
 * Bounded in-memory store of parsed documents, so a document is parsed once
 * and can be transformed several times.  Least recently used entries are
 * evicted first.
 */
export class DocumentStore {
    private readonly documents = new Map<string, StoredDocument>();
    private readonly capacity: number;

    constructor(capacity = 20) {
        this.capacity = Math.max(1, Math.floor(capacity));
    }

    get size(): number {
        return this.documents.size;
    }

    put(document: StoredDocument): void {
        this.documents.delete(document.documentId);
        this.documents.set(document.documentId, document);

        while (this.documents.size > this.capacity) {
            const oldest = this.documents.keys().next();
            if (oldest.done) {
                break;
            }
            this.documents.delete(oldest.value);
        }
    }

    get(documentId: string): StoredDocument | undefined {
        const document = this.documents.get(documentId);
        if (document) {
            // Re-insert to mark as most recently used
            this.documents.delete(documentId);
            this.documents.set(documentId, document);
        }
        return document;
    }
}
