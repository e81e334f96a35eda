import type { CandidateMetadata, DocumentStore, RecipeDocument } from './interfaces';
import { logger } from '../utils/logger';

/**
 * Simple in-memory implementation of the DocumentStore collaborator.
 * Used by tests and single-process deployments; data lives only for the
 * lifetime of the process. Iteration order is first-insertion order, and
 * replacing a record keeps its position.
 */
export class InMemoryDocumentStore implements DocumentStore {
    private documents = new Map<string, RecipeDocument>();

    constructor(documents: readonly RecipeDocument[] = []) {
        this.upsertMany(documents);
    }

    upsert(document: RecipeDocument): void {
        this.documents.set(document.id, document);
    }

    upsertMany(documents: readonly RecipeDocument[]): void {
        for (const document of documents) {
            this.upsert(document);
        }
        if (documents.length > 0) {
            logger.debug(`InMemoryDocumentStore: Stored ${documents.length} documents (${this.documents.size} total)`);
        }
    }

    delete(id: string): boolean {
        return this.documents.delete(id);
    }

    clear(): void {
        this.documents.clear();
    }

    size(): number {
        return this.documents.size;
    }

    async getAllDocuments(): Promise<RecipeDocument[]> {
        return Array.from(this.documents.values());
    }

    async getDocumentMetadata(id: string): Promise<CandidateMetadata | undefined> {
        return this.documents.get(id)?.metadata;
    }
}
