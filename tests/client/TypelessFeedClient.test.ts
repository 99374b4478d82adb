import { expect } from 'chai';
import sinon from 'sinon';
import { describe, it, beforeEach, afterEach } from 'mocha';
import { FetchFn, TypelessFeedClient, validateUrl } from '../../src/client/TypelessFeedClient';
import { FeedClientError } from '../../src/client/errors';
import { buildEntryXml } from '../../src/client/entityXml';
import { entity, scalar } from '../../src/entity/entity_types';

const LOGIN_URL = 'http://localhost:8080/accounts/ClientLogin';
const FEED_URL = 'http://localhost:8080/feeds/items';
const ENTRY_URL = 'http://localhost:8080/feeds/items/1';

const ENTRY_XML =
    '<entry xmlns="http://www.w3.org/2005/Atom"><id>1</id>' +
    '<content type="application/xml"><entity><name>first</name></entity></content></entry>';

const FEED_XML =
    '<feed xmlns="http://www.w3.org/2005/Atom">' +
    '<entry><content type="application/xml"><entity><name>first</name></entity></content></entry>' +
    '<entry><content type="application/xml"><entity><name>second</name></entity></content></entry>' +
    '</feed>';

async function clientErrorFrom(promise: Promise<unknown>): Promise<FeedClientError> {
    try {
        await promise;
    } catch (error) {
        if (error instanceof FeedClientError) {
            return error;
        }
        expect.fail(`Expected a FeedClientError, got ${String(error)}`);
    }
    expect.fail('Expected a FeedClientError to be thrown');
}

function headersOf(init: RequestInit | undefined): Headers {
    return new Headers(init?.headers);
}

describe('TypelessFeedClient', () => {
    let fetchStub: sinon.SinonStub<Parameters<FetchFn>, ReturnType<FetchFn>>;
    let client: TypelessFeedClient;

    beforeEach(() => {
        fetchStub = sinon.stub<Parameters<FetchFn>, ReturnType<FetchFn>>();
        client = new TypelessFeedClient({ authnUrl: 'localhost:8080', serviceName: 'esp', fetchFn: fetchStub });
    });

    afterEach(() => {
        sinon.restore();
    });

    async function logIn(): Promise<void> {
        fetchStub.onCall(0).resolves(new Response('SID=sid\nLSID=lsid\nAuth=tok123\n'));
        await client.authenticate('tester', 'test-secret');
    }

    describe('authenticate', () => {
        it('should build the login URL from protocol and host', () => {
            expect(client.loginUrl).to.equal(LOGIN_URL);
            const secure = new TypelessFeedClient({ authnUrl: 'feeds.test', authnProtocol: 'https', serviceName: 'esp' });
            expect(secure.loginUrl).to.equal('https://feeds.test/accounts/ClientLogin');
        });

        it('should post the credentials as a form and keep the issued token', async () => {
            await logIn();

            expect(fetchStub.calledOnce).to.be.true;
            const [url, init] = fetchStub.firstCall.args;
            expect(url).to.equal(LOGIN_URL);
            expect(init?.method).to.equal('POST');
            expect(headersOf(init).get('Content-Type')).to.equal('application/x-www-form-urlencoded');
            expect(init?.body).to.equal(
                'accountType=HOSTED_OR_GOOGLE&Email=tester&Passwd=test-secret&service=esp&source=feedtool-1.0'
            );
            expect(client.isAuthenticated).to.be.true;
        });

        it('should fail when the response carries no token', async () => {
            fetchStub.resolves(new Response('SID=sid\n'));

            const error = await clientErrorFrom(client.authenticate('tester', 'test-secret'));

            expect(error.message).to.equal(`Login response from ${LOGIN_URL} contained no Auth= token`);
            expect(client.isAuthenticated).to.be.false;
        });

        it('should report a rejected login with its HTTP status', async () => {
            fetchStub.resolves(new Response('Error=BadAuthentication\n', { status: 403 }));

            const error = await clientErrorFrom(client.authenticate('tester', 'wrong-secret'));

            expect(error.status).to.equal(403);
            expect(error.message).to.equal(`POST ${LOGIN_URL} failed with HTTP 403: Error=BadAuthentication`);
        });

        it('should wrap network failures', async () => {
            fetchStub.rejects(new Error('connect ECONNREFUSED'));

            const error = await clientErrorFrom(client.authenticate('tester', 'test-secret'));

            expect(error.message).to.equal(`Request to ${LOGIN_URL} failed: connect ECONNREFUSED`);
            expect(error.status).to.be.undefined;
            expect(error.cause).to.be.instanceOf(Error);
        });
    });

    describe('requests', () => {
        it('should fetch a feed with the login token', async () => {
            await logIn();
            fetchStub.onCall(1).resolves(new Response(FEED_XML));

            const feed = await client.getEntries(FEED_URL);

            expect(feed).to.deep.equal([entity({ name: scalar('first') }), entity({ name: scalar('second') })]);
            const [url, init] = fetchStub.secondCall.args;
            expect(url).to.equal(FEED_URL);
            expect(init?.method).to.equal('GET');
            expect(headersOf(init).get('Authorization')).to.equal('GoogleLogin auth=tok123');
            expect(init?.body).to.be.undefined;
        });

        it('should fetch a single entry', async () => {
            await logIn();
            fetchStub.onCall(1).resolves(new Response(ENTRY_XML));

            expect(await client.getEntry(ENTRY_URL)).to.deep.equal(entity({ name: scalar('first') }));
        });

        it('should post a new entry as an Atom document', async () => {
            await logIn();
            fetchStub.onCall(1).resolves(new Response(ENTRY_XML, { status: 201 }));
            const toInsert = entity({ name: scalar('first') });

            const stored = await client.insertEntry(FEED_URL, toInsert);

            expect(stored).to.deep.equal(toInsert);
            const [url, init] = fetchStub.secondCall.args;
            expect(url).to.equal(FEED_URL);
            expect(init?.method).to.equal('POST');
            expect(headersOf(init).get('Content-Type')).to.equal('application/atom+xml');
            expect(init?.body).to.equal(buildEntryXml(toInsert));
        });

        it('should put an updated entry', async () => {
            await logIn();
            fetchStub.onCall(1).resolves(new Response(ENTRY_XML));

            await client.updateEntry(ENTRY_URL, entity({ name: scalar('first') }));

            const [, init] = fetchStub.secondCall.args;
            expect(init?.method).to.equal('PUT');
            expect(init?.body).to.equal(buildEntryXml(entity({ name: scalar('first') })));
        });

        it('should delete an entry', async () => {
            await logIn();
            fetchStub.onCall(1).resolves(new Response(''));

            await client.deleteEntry(ENTRY_URL);

            const [url, init] = fetchStub.secondCall.args;
            expect(url).to.equal(ENTRY_URL);
            expect(init?.method).to.equal('DELETE');
        });

        it('should report a server error with status and body', async () => {
            await logIn();
            fetchStub.onCall(1).resolves(new Response('Entry not found\n', { status: 404 }));

            const error = await clientErrorFrom(client.getEntry(ENTRY_URL));

            expect(error.status).to.equal(404);
            expect(error.message).to.equal(`GET ${ENTRY_URL} failed with HTTP 404: Entry not found`);
        });

        it('should reject an invalid URL without sending anything', async () => {
            const error = await clientErrorFrom(client.getEntries('not a url'));

            expect(error.message).to.equal('Invalid URL: not a url');
            expect(fetchStub.called).to.be.false;
        });

        it('should parse entity XML for callers that read entry files', () => {
            expect(client.parseEntityXml('<entity><a>1</a></entity>')).to.deep.equal(entity({ a: scalar('1') }));
        });
    });

    describe('validateUrl', () => {
        it('should return the normalized URL', () => {
            expect(validateUrl('http://Feeds.Test')).to.equal('http://feeds.test/');
            expect(validateUrl(FEED_URL)).to.equal(FEED_URL);
        });

        it('should throw FeedClientError for a relative URL', () => {
            expect(() => validateUrl('/feeds/items')).to.throw(FeedClientError, 'Invalid URL: /feeds/items');
        });
    });
});
