import { Command, Option } from 'commander';
import { FeedClientError } from '../client/errors';
import { IFeedClient } from '../client/IFeedClient';
import { TypelessFeedClient, TypelessFeedClientOptions } from '../client/TypelessFeedClient';
import { runDelete } from '../commands/delete';
import { runExpand } from '../commands/expand';
import { runGetEntry } from '../commands/getEntry';
import { runGetFeed } from '../commands/getFeed';
import { runInsert } from '../commands/insert';
import { runRender } from '../commands/render';
import { runUpdate } from '../commands/update';
import {
    AUTHN_PROTOCOL_ENV_VAR,
    AUTHN_SERVICE_ENV_VAR,
    AUTHN_URL_ENV_VAR,
    DEFAULT_AUTHN_PROTOCOL,
    PASSWORD_ENV_VAR,
    USERNAME_ENV_VAR,
} from '../config';
import { ExpansionError } from '../embed/errors';
import { OutputSink, StringSink } from '../render/XmlRenderer';
import { dbg, errorMessage, persistOutput, setVerbose } from '../utils';
import { CredentialPromptFn, getUserCredentials } from './credentials';

export const GENERAL_ERROR = 1;
export const EXPANSION_ERROR = 2;
export const CLIENT_ERROR = 3;
export const COMMAND_PARSING_ERROR = 4;
export const UNHANDLED_ERROR = 5;

export type GlobalOptions = {
    authnUrl?: string;
    authnProtocol: string;
    authnService?: string;
    username?: string;
    password?: string;
    output?: string;
    verbose?: boolean;
};

export interface ProgramDependencies {
    createClient?: (options: TypelessFeedClientOptions) => IFeedClient;
    promptFn?: CredentialPromptFn;
    out?: OutputSink;
    exitFn?: (code: number) => void;
    persistOutputFn?: (content: string, outputPath: string) => Promise<void>;
}

/**
 * Maps an error to the process exit code reported for it.
 */
export function exitCodeFor(error: unknown): number {
    if (error instanceof ExpansionError) {
        return EXPANSION_ERROR;
    }
    if (error instanceof FeedClientError) {
        return CLIENT_ERROR;
    }
    return GENERAL_ERROR;
}

/**
 * Builds the `feedtool` command-line program.
 */
export function createProgram(deps: ProgramDependencies = {}): Command {
    const createClient = deps.createClient ?? ((options: TypelessFeedClientOptions) => new TypelessFeedClient(options));
    const exitFn = deps.exitFn ?? ((code: number) => process.exit(code));
    const persistOutputFn = deps.persistOutputFn ?? ((content: string, outputPath: string) => persistOutput(content, outputPath));

    const program: Command = new Command();

    // --- Global Options ---
    program
        .name('feedtool')
        .version('1.0.0')
        .description('Command-line client for typeless entity feeds')
        .addOption(new Option('--authn-url <host:port>', 'Server that handles authentication and issues the request token').env(AUTHN_URL_ENV_VAR))
        .addOption(new Option('--authn-protocol <protocol>', 'Protocol of the authentication server (http or https)')
            .env(AUTHN_PROTOCOL_ENV_VAR)
            .default(DEFAULT_AUTHN_PROTOCOL))
        .addOption(new Option('--authn-service <name>', 'Service the user account is associated with').env(AUTHN_SERVICE_ENV_VAR))
        .addOption(new Option('-u, --username <name>', 'User name used for login; asked on the console when absent').env(USERNAME_ENV_VAR))
        .addOption(new Option('-p, --password <password>', 'Password used for login; asked on the console when absent').env(PASSWORD_ENV_VAR))
        .option('-o, --output <path>', 'Write XML output to a file instead of stdout')
        .option('-v, --verbose', 'Print debug output');

    program.hook('preAction', () => {
        setVerbose(Boolean(program.opts<GlobalOptions>().verbose));
    });

    /**
     * Runs a command body with the selected output sink, writing buffered
     * output to the --output file afterwards. Commands that print nothing pass
     * `printsOutput = false` so that --output never creates an empty file.
     * Failures are reported and turned into an exit code.
     */
    async function runWithOutput(
        commandName: string,
        body: (out: OutputSink) => Promise<void>,
        printsOutput = true
    ): Promise<void> {
        const { output } = program.opts<GlobalOptions>();
        const buffer = output && printsOutput ? new StringSink() : undefined;
        try {
            await body(buffer ?? deps.out ?? process.stdout);
            if (buffer && output) {
                await persistOutputFn(buffer.toString(), output);
            }
            dbg(`${commandName} command finished successfully.`);
        } catch (error) {
            console.error(`Error: ${errorMessage(error)}`);
            dbg(`${commandName} command failed: ${String(error)}`);
            exitFn(exitCodeFor(error));
        }
    }

    /**
     * Like runWithOutput, for commands that talk to the feed service: checks the
     * login settings, asks for missing credentials and logs in first.
     */
    async function runRemote(
        commandName: string,
        body: (client: IFeedClient, out: OutputSink) => Promise<void>,
        printsOutput = true
    ): Promise<void> {
        const opts = program.opts<GlobalOptions>();
        if (!opts.authnUrl) {
            program.error('Must specify the URL of the server that will handle authentication (--authn-url)', { exitCode: COMMAND_PARSING_ERROR });
        }
        if (!opts.authnService) {
            program.error('Must specify the service name that will be used to authenticate users (--authn-service)', { exitCode: COMMAND_PARSING_ERROR });
        }
        const client = createClient({
            authnUrl: opts.authnUrl,
            authnProtocol: opts.authnProtocol,
            serviceName: opts.authnService,
        });
        await runWithOutput(commandName, async (out) => {
            const { username, password } = await getUserCredentials({ username: opts.username, password: opts.password }, deps.promptFn);
            await client.authenticate(username, password);
            await body(client, out);
        }, printsOutput);
    }

    // --- Define Commands ---

    program
        .command('getFeed')
        .description('Print all entries of a feed')
        .argument('<url>', 'URL of the feed')
        .action(async (url: string) => {
            await runRemote('getFeed', async (client, out) => {
                await runGetFeed(url, client, out);
            });
        });

    program
        .command('getEntry')
        .description('Print a single entry')
        .argument('<url>', 'URL of the entry')
        .action(async (url: string) => {
            await runRemote('getEntry', async (client, out) => {
                await runGetEntry(url, client, out);
            });
        });

    program
        .command('insert')
        .description('Insert a new entry into a feed from an entity XML file')
        .argument('<url>', 'URL of the feed')
        .argument('<entryFile>', 'Path to the entity XML file to insert')
        .action(async (url: string, entryFile: string) => {
            await runRemote('insert', async (client, out) => {
                await runInsert(url, entryFile, client, out);
            });
        });

    program
        .command('update')
        .description('Update an entry from an entity XML file')
        .argument('<url>', 'URL of the entry')
        .argument('<entryFile>', 'Path to the entity XML file holding the new content')
        .action(async (url: string, entryFile: string) => {
            await runRemote('update', async (client, out) => {
                await runUpdate(url, entryFile, client, out);
            });
        });

    program
        .command('delete')
        .description('Delete an entry')
        .argument('<url>', 'URL of the entry')
        .action(async (url: string) => {
            await runRemote('delete', async (client) => {
                await runDelete(url, client);
            }, false);
        });

    program
        .command('expand')
        .description('Print a document with its embedded files resolved')
        .argument('<file>', 'Path to the document')
        .action(async (file: string) => {
            await runWithOutput('expand', async (out) => {
                runExpand(file, out);
            });
        });

    program
        .command('render')
        .description('Parse an entity XML file and print it in display form')
        .argument('<file>', 'Path to the entity XML file')
        .action(async (file: string) => {
            await runWithOutput('render', async (out) => {
                runRender(file, out);
            });
        });

    return program;
}
