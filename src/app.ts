import express from 'express';
import cors from 'cors';
import compression from 'compression';
import helmet from 'helmet';
import { createMeetingPlacesRouter, type MeetingPlaceService } from './controllers/meeting-places/meeting-places.controller.js';
import { requestContextMiddleware } from './middleware/requestContext.middleware.js';
import { httpLoggingMiddleware } from './middleware/httpLogging.middleware.js';
import { errorMiddleware, notFoundMiddleware } from './middleware/error.middleware.js';

export interface AppDeps {
    pipeline: MeetingPlaceService;
}

export function createApp({ pipeline }: AppDeps) {
    const app = express();
    app.use(helmet());
    app.use(compression());
    app.use(cors());

    // Request context before the body parser so parse errors carry a traceId
    app.use(requestContextMiddleware);
    app.use(httpLoggingMiddleware);
    app.use(express.json({ limit: '1mb' }));

    app.get('/healthz', (_req, res) => res.status(200).send('ok'));

    app.use('/api/v1/meetings', createMeetingPlacesRouter(pipeline));

    app.use(notFoundMiddleware);
    app.use(errorMiddleware);

    return app;
}
