import 'dotenv/config';
import { readFileSync } from 'node:fs';
import Table from 'cli-table3';
import { createEngine } from '../services/engine';
import { describeError } from '../services/utils/errors';
import { isMarket } from '../services/utils/market';
import type { Market } from '../src/types/scoring';
import type { AnalysisTask } from '../src/types/stream';

const WATCHLIST_PATH = new URL('../data/watchlist.json', import.meta.url);

interface CliArgs {
    symbols: string[];
    market: Market | undefined;
    showNarrative: boolean;
}

const loadWatchlist = (): string[] => {
    const raw: unknown = JSON.parse(readFileSync(WATCHLIST_PATH, 'utf-8'));
    if (typeof raw !== 'object' || raw === null) return [];
    return Object.values(raw).flatMap(list => (Array.isArray(list) ? list.filter((s): s is string => typeof s === 'string') : []));
};

// Usage: runBatch [--market US] [--narrative] SYMBOL...
const parseArgs = (argv: string[]): CliArgs => {
    const symbols: string[] = [];
    let market: Market | undefined;
    let showNarrative = false;
    for (let i = 0; i < argv.length; i++) {
        const arg = argv[i];
        if (arg === '--narrative') {
            showNarrative = true;
        } else if (arg === '--market') {
            const value = (argv[++i] ?? '').toUpperCase();
            if (!isMarket(value)) throw new Error(`Unknown market "${value}" (expected CN, HK or US)`);
            market = value;
        } else {
            symbols.push(arg);
        }
    }
    return { symbols: symbols.length > 0 ? symbols : loadWatchlist(), market, showNarrative };
};

const chunk = <T>(items: T[], size: number): T[][] => {
    const out: T[][] = [];
    for (let i = 0; i < items.length; i += size) out.push(items.slice(i, i + size));
    return out;
};

const run = async () => {
    const args = parseArgs(process.argv.slice(2));
    const engine = createEngine();
    const { orchestrator, broadcaster, config } = engine;
    const clientId = 'cli';

    console.log(`\nStarting batch analysis for ${args.symbols.length} symbols (concurrency ${config.orchestrator.concurrency})...\n`);

    // Drain the client's stream so progress shows up and the queue stays small
    const controller = new AbortController();
    const consumer = (async () => {
        for await (const event of broadcaster.subscribe(clientId, controller.signal)) {
            if (event.type === 'progress' && (event.state === 'Done' || event.state === 'Failed')) {
                console.log(`  ${event.market}:${event.symbol} ${event.state}`);
            } else if (event.type === 'log' && event.level !== 'info') {
                console.warn(`  ! ${event.message}`);
            }
        }
    })();

    const finished: AnalysisTask[] = [];
    for (const group of chunk(args.symbols, config.orchestrator.maxBatchSize)) {
        let taskIds: string[];
        try {
            taskIds = orchestrator.submitBatchAnalysis(group, args.market, clientId, { streaming: false });
        } catch (error) {
            const { kind, message } = describeError(error);
            console.error(`Batch rejected [${kind}]: ${message}`);
            continue;
        }
        const settled = await Promise.all(taskIds.map(id => orchestrator.waitForTask(id)));
        for (const task of settled) {
            if (!task) continue;
            finished.push(task);
            orchestrator.acknowledge(task.id);
        }
    }

    controller.abort();
    await consumer;

    const table = new Table({
        head: ['Symbol', 'Market', 'Composite', 'Tech', 'Fund', 'Sent', 'Recommendation', 'Notes'],
        colWidths: [10, 8, 11, 7, 7, 7, 16, 50],
        wordWrap: true,
    });

    const fmt = (value: number | null | undefined) => (value === null || value === undefined ? '—' : value.toFixed(0));
    const byScore = (a: AnalysisTask, b: AnalysisTask) => (b.report?.scores.composite ?? -1) - (a.report?.scores.composite ?? -1);

    for (const task of [...finished].sort(byScore)) {
        const report = task.report;
        if (!report) {
            table.push([task.symbol, task.market, '—', '—', '—', '—', 'FAILED', task.error ? task.error.message : 'unknown error']);
            continue;
        }
        const notes = report.partial ? `missing: ${report.missing.join(', ')}` : `via ${report.narrativeSource}`;
        table.push([
            report.symbol,
            report.market,
            report.scores.composite.toFixed(1),
            fmt(report.scores.technical),
            fmt(report.scores.fundamental),
            fmt(report.scores.sentiment),
            report.recommendation,
            notes,
        ]);
    }

    console.log('\n' + table.toString());

    if (args.showNarrative) {
        for (const task of finished) {
            if (task.report) console.log(`\n${task.report.narrative}\n`);
        }
    }

    const failed = finished.filter(t => t.state === 'Failed').length;
    console.log(`\nBatch complete: ${finished.length - failed} done, ${failed} failed.`);
    engine.shutdown();
};

run().catch(error => {
    console.error(error instanceof Error ? error.message : error);
    process.exitCode = 1;
});
