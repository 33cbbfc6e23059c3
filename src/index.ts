#!/usr/bin/env node
import { CommanderError } from 'commander';
import { parseCliArgs } from './cli';
import { describeError } from './errors';
import { createRuntime } from './runtime';

async function main(): Promise<void> {
    const cli = parseCliArgs(process.argv.slice(2));
    const runtime = await createRuntime(cli, process.env);
    const controller = new AbortController();
    let stopping = false;

    const onSignal = (signal: NodeJS.Signals): void => {
        if (stopping) {
            return;
        }

        stopping = true;
        console.log('storage-tier-restore shutdown requested', {
            signal,
        });
        controller.abort();
    };
    const signals: NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];

    for (const signal of signals) {
        process.once(signal, onSignal);
    }

    runtime.refresher.start();

    try {
        const outcome = cli.resume
            ? await runtime.coordinator.resume(cli.resume, {
                signal: controller.signal,
            })
            : await runtime.coordinator.run({
                paths: cli.bucketPaths,
                signal: controller.signal,
                ttlDays: cli.ttlDays,
            });

        console.log('storage-tier-restore runtime stopped', {
            failed_paths: outcome.failedPaths,
            ledger_cleared: outcome.ledgerCleared,
            request_id: outcome.requestId,
        });
    } finally {
        for (const signal of signals) {
            process.removeListener(signal, onSignal);
        }

        await runtime.close();
    }
}

if (require.main === module) {
    main().catch((error: unknown) => {
        if (error instanceof CommanderError && error.exitCode === 0) {
            return;
        }

        console.error('storage-tier-restore failed', describeError(error));
        process.exitCode = 1;
    });
}
