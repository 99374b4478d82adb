import {
    CLIENT_LOGIN_ACCOUNT_TYPE,
    CLIENT_LOGIN_PATH,
    CLIENT_SOURCE,
    DEFAULT_AUTHN_PROTOCOL,
} from '../config';
import { Entity, Feed } from '../entity/entity_types';
import { dbg, errorMessage } from '../utils';
import { buildEntryXml, parseEntityXml, parseEntryXml, parseFeedXml } from './entityXml';
import { FeedClientError } from './errors';
import { IFeedClient } from './IFeedClient';

export type FetchFn = (url: string, init?: RequestInit) => Promise<Response>;

export interface TypelessFeedClientOptions {
    /** Host (and port) of the login server, e.g. `localhost:8080`. */
    authnUrl: string;
    authnProtocol?: string;
    /** Service the account is associated with. */
    serviceName: string;
    source?: string;
    fetchFn?: FetchFn;
}

const ATOM_CONTENT_TYPE = 'application/atom+xml';
const AUTH_TOKEN_PREFIX = 'Auth=';

/**
 * Feed service client that exchanges entities as untyped `<entity>` XML
 * wrapped in Atom entries.
 */
export class TypelessFeedClient implements IFeedClient {
    private readonly authnUrl: string;
    private readonly authnProtocol: string;
    private readonly serviceName: string;
    private readonly source: string;
    private readonly fetchFn: FetchFn;
    private authToken?: string;

    constructor(options: TypelessFeedClientOptions) {
        this.authnUrl = options.authnUrl;
        this.authnProtocol = options.authnProtocol || DEFAULT_AUTHN_PROTOCOL;
        this.serviceName = options.serviceName;
        this.source = options.source || CLIENT_SOURCE;
        this.fetchFn = options.fetchFn || ((url, init) => fetch(url, init));
    }

    get loginUrl(): string {
        return `${this.authnProtocol}://${this.authnUrl}${CLIENT_LOGIN_PATH}`;
    }

    get isAuthenticated(): boolean {
        return this.authToken !== undefined;
    }

    async authenticate(username: string, password: string): Promise<void> {
        const form = new URLSearchParams({
            accountType: CLIENT_LOGIN_ACCOUNT_TYPE,
            Email: username,
            Passwd: password,
            service: this.serviceName,
            source: this.source,
        });
        dbg(`TypelessFeedClient: Logging in as ${username} at ${this.loginUrl}`);
        const response = await this.send(this.loginUrl, {
            method: 'POST',
            headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
            body: form.toString(),
        });
        const token = (await response.text())
            .split(/\r?\n/)
            .find(line => line.startsWith(AUTH_TOKEN_PREFIX))
            ?.slice(AUTH_TOKEN_PREFIX.length);
        if (!token) {
            throw new FeedClientError(`Login response from ${this.loginUrl} contained no ${AUTH_TOKEN_PREFIX} token`);
        }
        this.authToken = token;
        dbg('TypelessFeedClient: Login succeeded.');
    }

    async getEntries(url: string): Promise<Feed> {
        return parseFeedXml(await this.request('GET', url));
    }

    async getEntry(url: string): Promise<Entity> {
        return parseEntryXml(await this.request('GET', url));
    }

    async insertEntry(url: string, entity: Entity): Promise<Entity> {
        return parseEntryXml(await this.request('POST', url, buildEntryXml(entity)));
    }

    async updateEntry(url: string, entity: Entity): Promise<Entity> {
        return parseEntryXml(await this.request('PUT', url, buildEntryXml(entity)));
    }

    async deleteEntry(url: string): Promise<void> {
        await this.request('DELETE', url);
    }

    parseEntityXml(xml: string): Entity {
        return parseEntityXml(xml);
    }

    private async request(method: string, url: string, body?: string): Promise<string> {
        const target = validateUrl(url);
        const headers: Record<string, string> = {};
        if (this.authToken) {
            headers['Authorization'] = `GoogleLogin auth=${this.authToken}`;
        }
        if (body !== undefined) {
            headers['Content-Type'] = ATOM_CONTENT_TYPE;
        }
        dbg(`TypelessFeedClient: ${method} ${target}`);
        const response = await this.send(target, { method, headers, body });
        return response.text();
    }

    private async send(url: string, init: RequestInit): Promise<Response> {
        let response: Response;
        try {
            response = await this.fetchFn(url, init);
        } catch (error: unknown) {
            throw new FeedClientError(`Request to ${url} failed: ${errorMessage(error)}`, undefined, { cause: error });
        }
        if (!response.ok) {
            const detail = (await response.text()).trim();
            throw new FeedClientError(
                `${init.method ?? 'GET'} ${url} failed with HTTP ${response.status}${detail ? `: ${detail}` : ''}`,
                response.status
            );
        }
        return response;
    }
}

/**
 * Checks that `url` is an absolute URL and returns it in normalized form.
 * @throws FeedClientError for anything `new URL()` rejects.
 */
export function validateUrl(url: string): string {
    try {
        return new URL(url).toString();
    } catch (error: unknown) {
        throw new FeedClientError(`Invalid URL: ${url}`, undefined, { cause: error });
    }
}
