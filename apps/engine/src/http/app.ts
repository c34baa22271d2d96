/**
 * HTTP application
 *
 * Form in, results page out, plus JSON endpoints for the pipeline, chat
 * follow-ups and health checks.
 */

import express, { Express, NextFunction, Request, Response } from 'express';
import { z } from 'zod';
import { respondToChat } from '../chat/assistant';
import { InvalidRequestError, errorMessage } from '../errors';
import { createLogger } from '../logger';
import { ContentOrchestrator } from '../pipeline/orchestrator';
import { PluginRegistry, pluginCounts } from '../pipeline/registry';
import { parseGenerateForm } from './forms';
import { requestIdMiddleware, timingMiddleware } from './middleware';
import { renderErrorPage, renderFormPage, renderResultsPage } from './views';

const logger = createLogger('http');

export interface AppDependencies {
    registry: PluginRegistry;
    orchestrator: ContentOrchestrator;
}

const chatSchema = z.object({
    message: z.string().trim().min(1),
    analysis_data: z.string().default('{}'),
});

export function createApp({ registry, orchestrator }: AppDependencies): Express {
    const app = express();

    app.disable('x-powered-by');
    app.use(requestIdMiddleware);
    app.use(timingMiddleware);
    app.use(express.urlencoded({ extended: false, limit: '5mb' }));
    app.use(express.json({ limit: '5mb' }));

    app.get('/', (_req: Request, res: Response) => {
        res.type('html').send(renderFormPage());
    });

    app.post('/generate', async (req: Request, res: Response) => {
        try {
            const request = parseGenerateForm(req.body);
            const result = await orchestrator.run(request);
            res.type('html').send(renderResultsPage(result));
        } catch (error) {
            if (error instanceof InvalidRequestError) {
                res.status(400).type('html').send(renderErrorPage(400, error.message));
                return;
            }
            logger.error('Content generation failed', {
                requestId: res.locals.requestId,
                error: errorMessage(error),
            });
            res.status(500).type('html').send(renderErrorPage(500, 'Content generation failed. Please try again.'));
        }
    });

    app.post('/api/generate', async (req: Request, res: Response) => {
        try {
            const request = parseGenerateForm(req.body);
            const result = await orchestrator.run(request);
            res.json(result);
        } catch (error) {
            if (error instanceof InvalidRequestError) {
                res.status(400).json({ error: error.message, field: error.field });
                return;
            }
            logger.error('Content generation failed', {
                requestId: res.locals.requestId,
                error: errorMessage(error),
            });
            res.status(500).json({ error: 'Content generation failed' });
        }
    });

    app.get('/health', (_req: Request, res: Response) => {
        res.json({
            status: 'healthy',
            components: registry.components,
            plugins: pluginCounts(registry),
        });
    });

    app.post('/api/chat', (req: Request, res: Response) => {
        const parsed = chatSchema.safeParse(req.body ?? {});
        if (!parsed.success) {
            res.status(400).json({ error: 'Missing required field: message' });
            return;
        }
        res.json({ response: respondToChat(parsed.data.message, parsed.data.analysis_data) });
    });

    app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
        logger.error('Unhandled error', { error: err.message });
        if (!res.headersSent) {
            res.status(500).json({ error: 'Internal server error' });
        }
    });

    return app;
}
