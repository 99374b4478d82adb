import { Entity, Feed } from '../entity/entity_types';

export interface IFeedClient {
    /**
     * Logs in to the feed service; later requests carry the issued token.
     * @throws FeedClientError when the credentials are rejected.
     */
    authenticate(username: string, password: string): Promise<void>;

    /** Fetches all entries of the feed at `url`, in server order. */
    getEntries(url: string): Promise<Feed>;

    /** Fetches the single entry at `url`. */
    getEntry(url: string): Promise<Entity>;

    /** Adds `entity` to the feed at `url` and returns the entity the server stored. */
    insertEntry(url: string, entity: Entity): Promise<Entity>;

    /** Replaces the entry at `url` and returns the entity the server stored. */
    updateEntry(url: string, entity: Entity): Promise<Entity>;

    deleteEntry(url: string): Promise<void>;

    /** Parses `<entity>` XML, as printed by the renderer, into an entity. */
    parseEntityXml(xml: string): Entity;
}
