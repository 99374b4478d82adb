import { IFeedClient } from '../client/IFeedClient';
import { loadDocument } from '../embed/DocumentLoader';
import { Entity } from '../entity/entity_types';
import { OutputSink, RenderCursor, writeEntity } from '../render/XmlRenderer';
import { LoadDocumentFn, loadEntity } from './insert';

/**
 * Replaces the entry at `url` with the entity described by `entryFilePath`
 * and prints the entity the server stored.
 */
export async function runUpdate(
    url: string,
    entryFilePath: string,
    client: IFeedClient,
    out: OutputSink = process.stdout,
    loadFn: LoadDocumentFn = loadDocument
): Promise<Entity> {
    const entity = loadEntity(entryFilePath, client, loadFn);
    const updated = await client.updateEntry(url, entity);
    writeEntity(updated, new RenderCursor(out));
    return updated;
}
