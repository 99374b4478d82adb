import { parseEntityXml } from '../client/entityXml';
import { loadDocument } from '../embed/DocumentLoader';
import { Entity } from '../entity/entity_types';
import { OutputSink, RenderCursor, writeEntity } from '../render/XmlRenderer';
import { LoadDocumentFn } from './insert';

/**
 * Loads an `<entity>` document, parses it and prints it the way the feed
 * commands print server responses. Works offline.
 */
export function runRender(
    filePath: string,
    out: OutputSink = process.stdout,
    loadFn: LoadDocumentFn = loadDocument,
    parseFn: (xml: string) => Entity = parseEntityXml
): Entity {
    const entity = parseFn(loadFn(filePath));
    writeEntity(entity, new RenderCursor(out));
    return entity;
}
