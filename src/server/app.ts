/**
 * Express 앱 구성 (listen은 index.ts에서)
 */
import express, { type Express } from 'express';
import cors from 'cors';
import type { AppConfig } from '../../shared/config/env.js';
import { createAnalyzeRouter, type Analyzer } from './routes/analyze.js';
import { createHealthRouter } from './routes/health.js';

export function createApp(config: AppConfig, analyze: Analyzer): Express {
    const app: Express = express();

    // 미들웨어
    app.use(cors());
    app.use(express.json());

    // 요청 로깅
    app.use((req, _res, next) => {
        console.log(`📨 ${req.method} ${req.path}`);
        next();
    });

    // 라우터 등록
    app.use('/api/health', createHealthRouter(config));
    app.use('/api/analyze', createAnalyzeRouter(analyze));

    // 404 핸들러
    app.use((_req, res) => {
        res.status(404).json({ error: 'Not Found' });
    });

    // 에러 핸들러
    app.use((err: Error, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
        console.error('❌ 서버 오류:', err.message);
        res.status(500).json({ error: 'Internal Server Error', message: err.message });
    });

    return app;
}
