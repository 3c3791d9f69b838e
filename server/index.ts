import 'dotenv/config';
import { randomUUID } from 'node:crypto';
import express, { type Response } from 'express';
import cors from 'cors';
import { createEngine } from '../services/engine';
import { AnalysisRequestError, ConfigurationError, describeError } from '../services/utils/errors';
import { isMarket } from '../services/utils/market';
import type { Market } from '../src/types/scoring';
import type { StreamEvent } from '../src/types/stream';

const PORT = Number(process.env.PORT) || 3001;

let engine: ReturnType<typeof createEngine>;
try {
    engine = createEngine();
} catch (error) {
    if (error instanceof ConfigurationError) {
        console.error(`[Server] Invalid configuration: ${error.message}`);
        process.exit(1);
    }
    throw error;
}
const { orchestrator, broadcaster, config } = engine;

const app = express();

app.use(cors());
app.use(express.json());

const sendError = (res: Response, status: number, error: unknown) => {
    res.status(status).json({ error: describeError(error) });
};

const badRequest = (res: Response, message: string) => {
    res.status(400).json({ error: { kind: 'request.INVALID_BODY', message } });
};

const readMarket = (value: unknown): Market | undefined | null => {
    if (value === undefined || value === null || value === '') return undefined;
    return isMarket(value) ? value : null;
};

const writeEvent = (res: Response, event: StreamEvent) => {
    res.write(`id: ${event.seq}\nevent: ${event.type}\ndata: ${JSON.stringify(event)}\n\n`);
};

// Server-Sent Events stream for one client
app.get('/api/stream', async (req, res) => {
    const { clientId: requested } = req.query;
    const clientId = typeof requested === 'string' && requested ? requested : randomUUID();

    res.writeHead(200, {
        'Content-Type': 'text/event-stream',
        'Cache-Control': 'no-cache',
        Connection: 'keep-alive',
        'X-Accel-Buffering': 'no',
    });

    const controller = new AbortController();
    req.on('close', () => controller.abort());
    const heartbeat = setInterval(() => res.write(': heartbeat\n\n'), config.stream.heartbeatMs);
    console.log(`[Server] Stream opened for ${clientId}`);

    try {
        for await (const event of broadcaster.subscribe(clientId, controller.signal)) {
            writeEvent(res, event);
        }
    } catch (error) {
        console.error(`[Server] Stream error for ${clientId}:`, error instanceof Error ? error.message : error);
    } finally {
        clearInterval(heartbeat);
        res.end();
        console.log(`[Server] Stream closed for ${clientId}`);
    }
});

app.post('/api/analyze', (req, res) => {
    const { symbol, market, clientId, streaming } = req.body ?? {};
    if (typeof symbol !== 'string' || !symbol) return badRequest(res, 'symbol is required');
    if (typeof clientId !== 'string' || !clientId) return badRequest(res, 'clientId is required');
    const target = readMarket(market);
    if (target === null) return badRequest(res, `unknown market "${String(market)}"`);

    try {
        const taskId = orchestrator.submitAnalysis(symbol, target, clientId, { streaming: streaming !== false });
        res.status(202).json({ taskId });
    } catch (error) {
        if (error instanceof AnalysisRequestError) return sendError(res, 400, error);
        console.error('[Server] analyze failed:', error);
        sendError(res, 500, error);
    }
});

app.post('/api/batch-analyze', (req, res) => {
    const { symbols, market, clientId, streaming } = req.body ?? {};
    if (!Array.isArray(symbols) || !symbols.every((s): s is string => typeof s === 'string')) {
        return badRequest(res, 'symbols must be an array of strings');
    }
    if (typeof clientId !== 'string' || !clientId) return badRequest(res, 'clientId is required');
    const target = readMarket(market);
    if (target === null) return badRequest(res, `unknown market "${String(market)}"`);

    try {
        const taskIds = orchestrator.submitBatchAnalysis(symbols, target, clientId, { streaming: streaming !== false });
        res.status(202).json({ taskIds });
    } catch (error) {
        if (error instanceof AnalysisRequestError) return sendError(res, 400, error);
        console.error('[Server] batch-analyze failed:', error);
        sendError(res, 500, error);
    }
});

app.get('/api/tasks/:taskId', (req, res) => {
    const task = orchestrator.getTaskStatus(req.params.taskId);
    if (!task) return res.status(404).json({ error: { kind: 'request.UNKNOWN_TASK', message: 'Task not found' } });
    res.json(task);
});

app.post('/api/tasks/:taskId/ack', (req, res) => {
    const task = orchestrator.getTaskStatus(req.params.taskId);
    if (!task) return res.status(404).json({ error: { kind: 'request.UNKNOWN_TASK', message: 'Task not found' } });
    if (!orchestrator.acknowledge(task.id)) {
        return res.status(409).json({ error: { kind: 'request.TASK_RUNNING', message: `Task is ${task.state}` } });
    }
    res.json({ acknowledged: true });
});

app.get('/api/status', (_req, res) => {
    res.json({ status: 'ok', ...engine.status() });
});

const server = app.listen(PORT, () => {
    console.log(`[Server] Running on http://localhost:${PORT}`);
});

const shutdown = () => {
    console.log('[Server] Shutting down...');
    engine.shutdown();
    server.close(() => process.exit(0));
};

process.on('SIGINT', shutdown);
process.on('SIGTERM', shutdown);
