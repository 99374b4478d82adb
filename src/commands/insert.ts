import { IFeedClient } from '../client/IFeedClient';
import { loadDocument } from '../embed/DocumentLoader';
import { Entity } from '../entity/entity_types';
import { OutputSink, RenderCursor, writeEntity } from '../render/XmlRenderer';
import { dbg } from '../utils';

export type LoadDocumentFn = (filePath: string) => string;

/**
 * Reads an `<entity>` document, resolving its embedded files, and parses it
 * with the client.
 */
export function loadEntity(entryFilePath: string, client: IFeedClient, loadFn: LoadDocumentFn = loadDocument): Entity {
    dbg(`Reading entry from ${entryFilePath}`);
    return client.parseEntityXml(loadFn(entryFilePath));
}

/**
 * Inserts the entity described by `entryFilePath` into the feed at `url` and
 * prints the entity the server stored.
 *
 * @param url - URL of the feed to insert into.
 * @param entryFilePath - Path to the `<entity>` XML file; may embed other files.
 * @param client - Authenticated feed client.
 * @param out - Where the resulting XML is written (defaults to stdout).
 * @param loadFn - Injected document loader (defaults to loadDocument).
 */
export async function runInsert(
    url: string,
    entryFilePath: string,
    client: IFeedClient,
    out: OutputSink = process.stdout,
    loadFn: LoadDocumentFn = loadDocument
): Promise<Entity> {
    const entity = loadEntity(entryFilePath, client, loadFn);
    const inserted = await client.insertEntry(url, entity);
    writeEntity(inserted, new RenderCursor(out));
    return inserted;
}
