/**
 * Express API 서버
 */
import type { Server } from 'http';
import type { AppConfig } from '../../shared/config/env.js';
import type { AnalysisDependencies } from '../pipeline/runAnalysis.js';
import { analyzeForPresentation } from '../pipeline/presentation.js';
import { createApp } from './app.js';

export function startServer(config: AppConfig, deps: AnalysisDependencies): Server {
    const app = createApp(config, (url) =>
        analyzeForPresentation(url, deps, {
            timeoutMs: config.analysisTimeoutMs,
            segmentLimit: config.displaySegmentLimit,
        })
    );

    return app.listen(config.apiPort, () => {
        console.log(`
🚀 API Server is running!
━━━━━━━━━━━━━━━━━━━━━━━━━━━
📍 URL: http://localhost:${config.apiPort}
📋 Endpoints:
   GET  /api/health    - 서버 상태 확인
   POST /api/analyze   - 레포지토리 분석 { "url": "https://github.com/owner/repo" }
━━━━━━━━━━━━━━━━━━━━━━━━━━━
`);
    });
}
