/**
 * 헬스체크 라우터
 */
import { Router, type Request, type Response, type IRouter } from 'express';
import type { AppConfig } from '../../../shared/config/env.js';

export function createHealthRouter(config: AppConfig): IRouter {
    const router: IRouter = Router();

    /**
     * GET /api/health
     * 서버 상태와 설정된 자격 증명 확인 (값은 노출하지 않음)
     */
    router.get('/', (_req: Request, res: Response) => {
        const llmKey = config.llmProvider === 'anthropic' ? config.claudeApiKey : config.openaiApiKey;
        res.json({
            status: 'ok',
            timestamp: new Date().toISOString(),
            services: {
                api: 'online',
                github: config.githubToken ? 'authenticated' : 'anonymous',
                llm: {
                    provider: config.llmProvider,
                    configured: Boolean(llmKey),
                },
            },
        });
    });

    return router;
}
