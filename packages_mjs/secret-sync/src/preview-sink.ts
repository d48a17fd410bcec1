/**
 * Diff preview output, optionally through an external pretty-printer.
 */
import fs from 'fs';
import path from 'path';
import { spawn } from 'child_process';
import { TextSink } from './domain.js';
import { ConfigurationError, describeError } from './errors.js';
import { getLogger, SyncLogger } from './logger.js';

export interface DiffTool {
    name: string;
    command: string;
    args: string[];
}

/**
 * A diff tool resolved once at startup; `null` prints diffs unmodified.
 */
export type DiffToolChoice = DiffTool | null;

// Order of preference
export const DIFF_TOOLS: readonly DiffTool[] = [
    { name: 'delta', command: 'delta', args: ['--no-gitconfig', '--side-by-side'] },
    { name: 'difftastic', command: 'difftastic', args: ['--display=side-by-side'] },
    { name: 'diff-so-fancy', command: 'diff-so-fancy', args: [] }
];

export function findExecutable(command: string, env: NodeJS.ProcessEnv = process.env): string | null {
    const dirs = (env.PATH ?? '').split(path.delimiter).filter(Boolean);
    const extensions = process.platform === 'win32'
        ? ['', ...(env.PATHEXT ?? '.EXE;.CMD;.BAT').split(';')]
        : [''];

    for (const dir of dirs) {
        for (const ext of extensions) {
            const candidate = path.join(dir, command + ext);
            try {
                fs.accessSync(candidate, fs.constants.X_OK);
                if (fs.statSync(candidate).isFile()) {
                    return candidate;
                }
            } catch {
                // Not here; keep searching
            }
        }
    }
    return null;
}

export function detectDiffTool(env: NodeJS.ProcessEnv = process.env): DiffToolChoice {
    return DIFF_TOOLS.find(tool => findExecutable(tool.command, env) !== null) ?? null;
}

/**
 * Resolves `auto`, `none` or a tool name into the choice used for the rest of
 * the process.
 */
export function resolveDiffTool(choice: string = 'auto', env: NodeJS.ProcessEnv = process.env): DiffToolChoice {
    if (choice === 'auto') return detectDiffTool(env);
    if (choice === 'none') return null;

    const tool = DIFF_TOOLS.find(candidate => candidate.name === choice);
    if (!tool) {
        const names = ['auto', 'none', ...DIFF_TOOLS.map(candidate => candidate.name)];
        throw new ConfigurationError(`unknown diff tool '${choice}' (expected one of: ${names.join(', ')})`);
    }
    return tool;
}

export class PreviewSink {
    constructor(
        private tool: DiffToolChoice,
        private output: TextSink = process.stdout,
        private logger: SyncLogger = getLogger()
    ) { }

    get toolName(): string | null {
        return this.tool?.name ?? null;
    }

    /**
     * Shows a diff. Any failure of the external tool falls back to the raw
     * text, so a non-empty diff is always shown.
     */
    async show(diffText: string): Promise<void> {
        if (!diffText) return;

        if (!this.tool) {
            this.output.write(diffText);
            return;
        }

        try {
            const rendered = await this.runTool(this.tool, diffText);
            this.output.write(rendered);
        } catch (error) {
            this.logger.debug(`${this.tool.name} failed, showing raw diff: ${describeError(error)}`);
            this.output.write(diffText);
        }
    }

    private runTool(tool: DiffTool, input: string): Promise<string> {
        return new Promise((resolve, reject) => {
            const child = spawn(tool.command, tool.args, { stdio: ['pipe', 'pipe', 'inherit'] });
            const chunks: Buffer[] = [];

            child.stdout.on('data', (chunk: Buffer) => chunks.push(chunk));
            child.stdin.on('error', reject);
            child.on('error', reject);
            child.on('close', code => {
                if (code === 0) {
                    resolve(Buffer.concat(chunks).toString('utf-8'));
                } else {
                    reject(new Error(`${tool.name} exited with code ${code}`));
                }
            });

            child.stdin.end(input);
        });
    }
}
