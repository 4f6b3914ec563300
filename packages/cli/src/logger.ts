/**
 * Console output for the CLI.
 *
 * Wraps chalk colouring and ora spinners so that log lines never tear
 * through an active spinner.
 */

import chalk from 'chalk';
import ora, { type Ora } from 'ora';

/**
 * Options for {@link Logger}.
 */
export interface LoggerOptions {
    /** Print verbose lines. */
    verbose?: boolean;
    /** Animate spinners. Defaults to true; ora itself disables them off a TTY. */
    spinners?: boolean;
    /** Sink for regular output. Defaults to `console.log`. */
    out?: (line: string) => void;
    /** Sink for errors and warnings. Defaults to `console.error`. */
    err?: (line: string) => void;
}

/**
 * CLI logger with spinner bookkeeping.
 *
 * @example
 * ```typescript
 * const logger = new Logger({ verbose: true });
 * const spinner = logger.spinner('Translating 3 manifests...');
 * logger.verbose('serde 1.0 -> @crate_index//:serde');
 * logger.stopSpinner(spinner);
 * ```
 */
export class Logger {
    /** Currently running spinners. */
    private readonly spinners = new Set<Ora>();
    private readonly signalHandlers: Array<() => void> = [];
    private readonly isVerbose: boolean;
    private readonly animate: boolean;
    private readonly out: (line: string) => void;
    private readonly err: (line: string) => void;

    constructor(options: LoggerOptions = {}) {
        this.isVerbose = options.verbose ?? false;
        this.animate = options.spinners ?? true;
        this.out = options.out ?? ((line) => console.log(line));
        this.err = options.err ?? ((line) => console.error(line));
    }

    /**
     * Runs `print` with every spinning spinner cleared, then redraws them.
     */
    private withoutSpinners(print: () => void): void {
        for (const spinner of this.spinners) {
            if (spinner.isSpinning) spinner.clear();
        }
        print();
        for (const spinner of this.spinners) {
            if (spinner.isSpinning) spinner.render();
        }
    }

    /** Writes a line as is. */
    raw(text: string): void {
        this.withoutSpinners(() => this.out(text));
    }

    info(message: string): void {
        this.withoutSpinners(() => this.out(chalk.cyan(message)));
    }

    success(message: string): void {
        this.withoutSpinners(() => this.out(chalk.green(message)));
    }

    warn(message: string): void {
        this.withoutSpinners(() => this.err(chalk.yellow(message)));
    }

    error(message: string): void {
        this.withoutSpinners(() => this.err(chalk.red(message)));
    }

    /** Writes a grey line, only in verbose mode. */
    verbose(message: string): void {
        if (!this.isVerbose) return;
        this.withoutSpinners(() => this.out(chalk.gray(message)));
    }

    /**
     * Starts and registers a spinner.
     */
    spinner(text: string): Ora {
        const spinner = ora({
            text,
            color: 'cyan',
            isSilent: !this.animate,
        }).start();
        this.spinners.add(spinner);
        return spinner;
    }

    /**
     * Stops a spinner, leaving a final status line when given.
     */
    stopSpinner(
        spinner: Ora,
        outcome?: { status: 'succeed' | 'fail' | 'warn'; text: string },
    ): void {
        this.spinners.delete(spinner);
        if (!outcome) {
            spinner.stop();
            return;
        }
        switch (outcome.status) {
            case 'succeed':
                spinner.succeed(outcome.text);
                break;
            case 'fail':
                spinner.fail(outcome.text);
                break;
            case 'warn':
                spinner.warn(outcome.text);
                break;
        }
    }

    /**
     * Clears spinners on SIGINT/SIGTERM before exiting.
     */
    setupSignalHandlers(): void {
        const onSignal = () => {
            this.clearSpinners();
            process.exit(130);
        };
        process.on('SIGINT', onSignal);
        process.on('SIGTERM', onSignal);
        this.signalHandlers.push(() => {
            process.off('SIGINT', onSignal);
            process.off('SIGTERM', onSignal);
        });
    }

    private clearSpinners(): void {
        for (const spinner of this.spinners) {
            spinner.stop();
        }
        this.spinners.clear();
    }

    /**
     * Stops every spinner and removes the signal handlers.
     */
    cleanup(): void {
        this.clearSpinners();
        for (const remove of this.signalHandlers.splice(0)) {
            remove();
        }
    }
}
