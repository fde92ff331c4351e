/**
 * InstagramClient - Instagram backend contract and its instaloader CLI implementation
 *
 * Logins that need a verification code leave the instaloader process waiting
 * on its prompt; the caller either completes or aborts it.
 */

import { ChildProcess, spawn } from 'child_process';
import { logger } from '../../utils/logger';
import { CommandFailedError, CommandRunner, runCommand } from '../../utils/processRunner';

const TWO_FACTOR_PROMPT = 'Enter 2FA verification code';

export interface InstagramSession {
    username: string;
    sessionFile: string;
}

export interface InstagramClient {
    /** Download one post into the directory, logged in when a session is given */
    downloadPost(shortcode: string, directory: string, session?: InstagramSession): Promise<void>;

    /**
     * Log in and store the session in sessionFile.
     * Rejects with TwoFactorRequiredError when a verification code is needed.
     */
    login(username: string, password: string, sessionFile: string): Promise<void>;

    completeTwoFactor(code: string): Promise<void>;

    abortLogin(): void;
}

export class TwoFactorRequiredError extends Error {
    readonly username: string;

    constructor(username: string) {
        super(`Two-factor verification required for ${username}`);
        this.name = 'TwoFactorRequiredError';
        this.username = username;
    }
}

export type SpawnProcess = (command: string, args: string[]) => ChildProcess;

const spawnInteractive: SpawnProcess = (command, args) =>
    spawn(command, args, { stdio: ['pipe', 'pipe', 'pipe'] });

interface PendingLogin {
    username: string;
    proc: ChildProcess;
    finished: Promise<void>;
}

export class InstaloaderCli implements InstagramClient {
    private readonly binary: string;
    private readonly runner: CommandRunner;
    private readonly spawnProcess: SpawnProcess;
    private readonly timeoutMs: number;
    private pending?: PendingLogin;

    constructor(
        options: {
            binary?: string;
            runner?: CommandRunner;
            spawnProcess?: SpawnProcess;
            timeoutMs?: number;
        } = {},
    ) {
        this.binary = options.binary ?? 'instaloader';
        this.runner = options.runner ?? runCommand;
        this.spawnProcess = options.spawnProcess ?? spawnInteractive;
        this.timeoutMs = options.timeoutMs ?? 0;
    }

    async downloadPost(shortcode: string, directory: string, session?: InstagramSession): Promise<void> {
        const args = [
            ...(session ? ['--login', session.username, '--sessionfile', session.sessionFile] : []),
            '--dirname-pattern', directory,
            '--no-compress-json',
            '--quiet',
            '--',
            `-${shortcode}`,
        ];
        await this.runner(this.binary, args, { timeoutMs: this.timeoutMs });
    }

    login(username: string, password: string, sessionFile: string): Promise<void> {
        this.abortLogin();

        // instaloader takes the password from argv or a terminal prompt only.
        // On argv it shows in the process list until the login exits.
        const proc = this.spawnProcess(this.binary, [
            '--login', username,
            '--password', password,
            '--sessionfile', sessionFile,
        ]);
        let output = '';

        const finished = new Promise<void>((resolve, reject) => {
            proc.on('error', (error: NodeJS.ErrnoException) => {
                reject(error.code === 'ENOENT'
                    ? new Error(`${this.binary} is not installed or not on PATH`)
                    : error);
            });
            proc.on('close', (code) => {
                if (this.pending?.proc === proc) {
                    this.pending = undefined;
                }
                if (code === 0) {
                    resolve();
                } else {
                    reject(new CommandFailedError(this.binary, code, output));
                }
            });
        });

        return new Promise<void>((resolve, reject) => {
            let prompted = false;
            const onData = (data: Buffer): void => {
                output += data.toString();
                if (!prompted && output.includes(TWO_FACTOR_PROMPT)) {
                    prompted = true;
                    this.pending = { username, proc, finished };
                    reject(new TwoFactorRequiredError(username));
                }
            };
            proc.stdout?.on('data', onData);
            proc.stderr?.on('data', onData);

            // Once the prompt has been seen the outcome belongs to completeTwoFactor
            finished.then(resolve, reject);
        });
    }

    async completeTwoFactor(code: string): Promise<void> {
        const pending = this.pending;
        if (!pending) {
            throw new Error('No Instagram login is waiting for a verification code');
        }

        pending.proc.stdin?.write(`${code}\n`);
        pending.proc.stdin?.end();
        await pending.finished;
        logger.debug('instaloader verification completed', { username: pending.username });
    }

    abortLogin(): void {
        const pending = this.pending;
        if (!pending) return;

        this.pending = undefined;
        pending.proc.kill('SIGTERM');
        logger.debug('instaloader login aborted', { username: pending.username });
    }
}
