import { IFeedClient } from '../client/IFeedClient';
import { Entity } from '../entity/entity_types';
import { OutputSink, RenderCursor, writeEntity } from '../render/XmlRenderer';
import { dbg } from '../utils';

/**
 * Fetches the entry at `url` and prints it as `<entity>` XML.
 */
export async function runGetEntry(url: string, client: IFeedClient, out: OutputSink = process.stdout): Promise<Entity> {
    dbg(`Fetching entry ${url}`);
    const entity = await client.getEntry(url);
    writeEntity(entity, new RenderCursor(out));
    return entity;
}
