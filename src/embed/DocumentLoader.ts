import { dbg } from '../utils';
import { EmbeddingExpander } from './EmbeddingExpander';

/**
 * Reads documents from disk with their embedded file placeholders resolved.
 */
export class DocumentLoader {
    constructor(private readonly expander: EmbeddingExpander = new EmbeddingExpander()) {}

    /**
     * Loads `filePath` and expands it relative to the file's directory.
     * @throws ExpansionError if the document or any file it embeds cannot be read.
     */
    load(filePath: string): string {
        dbg(`Loading document ${filePath}`);
        return this.expander.expandFile(filePath);
    }
}

export function loadDocument(filePath: string): string {
    return new DocumentLoader().load(filePath);
}
