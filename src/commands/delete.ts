import { IFeedClient } from '../client/IFeedClient';
import { dbg } from '../utils';

export async function runDelete(url: string, client: IFeedClient): Promise<void> {
    dbg(`Deleting entry ${url}`);
    await client.deleteEntry(url);
    dbg('Entry deleted.');
}
