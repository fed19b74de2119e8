/**
 * 레포지토리 분석 라우터
 */
import { Router, type Request, type Response, type IRouter } from 'express';
import { v4 as uuidv4 } from 'uuid';
import type { PresentationResult } from '../../pipeline/presentation.js';
import { describeError } from '../../pipeline/errors.js';

export type Analyzer = (url: string) => Promise<PresentationResult>;

export function createAnalyzeRouter(analyze: Analyzer): IRouter {
    const router: IRouter = Router();

    /**
     * POST /api/analyze
     * { url } 을 받아 분석 결과 반환
     */
    router.post('/', async (req: Request, res: Response) => {
        const startTime = Date.now();
        const analysisId = uuidv4();
        const body: unknown = req.body;
        const url = typeof body === 'object' && body !== null && 'url' in body ? body.url : undefined;

        if (!url || typeof url !== 'string') {
            console.error(`❌ [${analysisId}] 잘못된 요청: url이 없거나 문자열이 아님`);
            res.status(400).json({ analysisId, error: 'Please provide a GitHub repository URL.' });
            return;
        }

        console.log(`🔍 [${analysisId}] 분석 요청: ${url}`);

        try {
            const outcome = await analyze(url);
            const responseTimeMs = Date.now() - startTime;

            if (!outcome.ok) {
                res.status(outcome.statusCode).json({ analysisId, error: outcome.error, responseTimeMs });
                return;
            }

            const { report, assessment } = outcome.result;
            console.log(`✅ [${analysisId}] 분석 완료 (${responseTimeMs}ms)`);

            res.json({
                analysisId,
                display: outcome.display,
                assessment,
                repository: report.info,
                structure: report.structure,
                activity: report.activity,
                sampledFileCount: report.sampledFileCount,
                responseTimeMs,
            });
        } catch (error) {
            console.error(`❌ [${analysisId}] 분석 오류:`, describeError(error));
            res.status(500).json({
                analysisId,
                error: 'Error analyzing repository.',
                message: describeError(error),
            });
        }
    });

    return router;
}
