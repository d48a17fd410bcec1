/**
 * `kvsync` command-line interface: list, pull and push.
 */
import { Command, Option } from 'commander';
import { KvStoreClient } from '@kvsync/kv-store-client';
import { SecretStore, TextSink } from '../domain.js';
import { loadEnvFile, resolveStoreSettings, StoreSettings, toClientConfig } from '../config.js';
import {
    ConsoleLogger, ENV_LOG_LEVEL, LOG_LEVELS, LogLevel, isLogLevel, loggerOptionsFromEnv, SyncLogger
} from '../logger.js';
import { buildMetadataBasePath } from '../path-translator.js';
import { PreviewSink, resolveDiffTool } from '../preview-sink.js';
import { SecretSyncEngine } from '../sync-engine.js';

export const DEFAULT_KV_ENGINE = 'kv';
export const DEFAULT_SECRETS_DIR = './vault-secrets';

export interface ClosableStore extends SecretStore {
    close(): Promise<void>;
}

export interface CliDependencies {
    env?: NodeJS.ProcessEnv;
    output?: TextSink;
    logger?: SyncLogger;
    createStore?: (settings: StoreSettings, logger: SyncLogger) => ClosableStore;
}

interface GlobalOptions {
    kvEngine: string;
    logLevel?: string;
    envFile?: string;
}

interface PushCommandOptions {
    dryRun?: boolean;
    continueOnError?: boolean;
    diffTool: string;
}

function describePath(engine: string, subPath?: string): string {
    return subPath ? `${engine}/${subPath}` : engine;
}

export function createProgram(deps: CliDependencies = {}): Command {
    const env = deps.env ?? process.env;
    const output = deps.output ?? process.stdout;
    const logger = deps.logger ?? new ConsoleLogger(loggerOptionsFromEnv(env));
    const createStore = deps.createStore
        ?? ((settings: StoreSettings, storeLogger: SyncLogger) => KvStoreClient.create(toClientConfig(settings, storeLogger)));

    const program = new Command();

    program
        .name('kvsync')
        .description('Sync secrets between a KVv2 secret store and local YAML files')
        .version('0.1.0')
        .option('--kv-engine <name>', 'Name of the KVv2 secret engine', DEFAULT_KV_ENGINE)
        .addOption(new Option('--log-level <level>', `Log level (overrides ${ENV_LOG_LEVEL})`)
            .choices(LOG_LEVELS))
        .option('--env-file <path>', 'Load VAULT_ADDR / VAULT_TOKEN from a dotenv file');

    // The env file may itself set KVSYNC_LOG_LEVEL, so it loads first
    program.hook('preAction', () => {
        const { logLevel, envFile } = program.opts<GlobalOptions>();
        if (envFile) {
            loadEnvFile(envFile, env);
        }
        const level: LogLevel | undefined = logLevel && isLogLevel(logLevel)
            ? logLevel
            : loggerOptionsFromEnv(env).level;
        if (level) {
            logger.setLevel(level);
        }
    });

    // The store is created only after configuration resolves, and closed on every exit path
    const withEngine = async <T>(
        namespace: string,
        run: (engine: SecretSyncEngine) => Promise<T>,
        preview?: PreviewSink
    ): Promise<T> => {
        const settings = resolveStoreSettings(namespace, env);
        const store = createStore(settings, logger);
        try {
            return await run(new SecretSyncEngine(store, { logger, output, preview }));
        } finally {
            await store.close();
        }
    };

    program
        .command('list')
        .description('List secret names')
        .argument('<namespace>', 'Store namespace')
        .argument('[path]', 'Path below the engine root')
        .action(async (namespace: string, subPath: string | undefined) => {
            const { kvEngine } = program.opts<GlobalOptions>();
            const metadataPath = buildMetadataBasePath(kvEngine, subPath);

            const keys = await withEngine(namespace, engine => engine.list(metadataPath));
            if (keys.length === 0) {
                output.write('No secrets found at the specified path\n');
                return;
            }

            output.write(`Secrets at ${describePath(kvEngine, subPath)} in namespace ${namespace}:\n`);
            for (const key of keys) {
                output.write(`  - ${key}\n`);
            }
        });

    program
        .command('pull')
        .description('Pull all secrets recursively to files')
        .argument('<namespace>', 'Store namespace')
        .argument('[path]', 'Path below the engine root')
        .argument('[output-dir]', 'Output directory', DEFAULT_SECRETS_DIR)
        .action(async (namespace: string, subPath: string | undefined, outputDir: string) => {
            const { kvEngine } = program.opts<GlobalOptions>();
            const metadataPath = buildMetadataBasePath(kvEngine, subPath);

            output.write(`Pulling all secrets recursively from ${describePath(kvEngine, subPath)} in namespace ${namespace} to ${outputDir}...\n`);
            await withEngine(namespace, engine => engine.pull(metadataPath, outputDir));
            output.write(`\nCompleted! Secrets have been saved to ${outputDir} as YAML files\n`);
        });

    program
        .command('push')
        .description('Push secrets from YAML files to the store')
        .argument('<namespace>', 'Store namespace')
        .argument('[path]', 'Path below the engine root')
        .argument('[input-dir]', 'Input directory', DEFAULT_SECRETS_DIR)
        .option('--dry-run', 'Show what would be changed without actually pushing')
        .option('--continue-on-error', 'Keep pushing remaining secrets after a failed write')
        .option('--diff-tool <tool>', 'Diff renderer for --dry-run: auto, none, delta, difftastic, diff-so-fancy', 'auto')
        .action(async (namespace: string, subPath: string | undefined, inputDir: string, options: PushCommandOptions) => {
            const { kvEngine } = program.opts<GlobalOptions>();
            const metadataPath = buildMetadataBasePath(kvEngine, subPath);
            const target = describePath(kvEngine, subPath);

            const preview = options.dryRun
                ? new PreviewSink(resolveDiffTool(options.diffTool, env), output, logger)
                : undefined;

            if (options.dryRun) {
                output.write(`DRY RUN: Showing what would be changed when pushing from ${inputDir} to ${target} in namespace ${namespace}...\n`);
            } else {
                output.write(`Pushing secrets from ${inputDir} to ${target} in namespace ${namespace}...\n`);
            }

            await withEngine(namespace, engine => engine.push(inputDir, metadataPath, {
                dryRun: options.dryRun ?? false,
                onWriteError: options.continueOnError ? 'continue' : 'abort'
            }), preview);

            if (options.dryRun) {
                output.write('\nDry run completed! Use without --dry-run to actually push changes.\n');
            } else {
                output.write('\nCompleted! Secrets have been pushed to the store.\n');
            }
        });

    return program;
}
