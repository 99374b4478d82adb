import { IFeedClient } from '../client/IFeedClient';
import { Feed } from '../entity/entity_types';
import { OutputSink, RenderCursor, writeFeed } from '../render/XmlRenderer';
import { dbg } from '../utils';

/**
 * Fetches the feed at `url` and prints it as `<entities>` XML.
 *
 * @param url - URL of the feed.
 * @param client - Authenticated feed client.
 * @param out - Where the XML is written (defaults to stdout).
 * @returns The fetched feed.
 */
export async function runGetFeed(url: string, client: IFeedClient, out: OutputSink = process.stdout): Promise<Feed> {
    dbg(`Fetching feed ${url}`);
    const feed = await client.getEntries(url);
    dbg(`Fetched ${feed.length} entries.`);
    writeFeed(feed, new RenderCursor(out));
    return feed;
}
