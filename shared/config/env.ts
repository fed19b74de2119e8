/**
 * 환경 변수 관리
 *
 * .env 파일에서 읽는 값:
 * 1. GITHUB_TOKEN (선택, 없으면 비인증 요청으로 동작)
 * 2. OPENAI_API_KEY / CLAUDE_API_KEY (LLM_PROVIDER에 따라 하나 필수)
 * 3. 분석 파라미터 (RECENT_ACTIVITY_DAYS, ANALYSIS_TIMEOUT_MS, DISPLAY_SEGMENT_LIMIT)
 * 4. API_PORT
 *
 * 값은 프로세스 시작 시 한 번 읽고, 실행 중에는 다시 읽지 않습니다.
 */

export type LlmProvider = 'openai' | 'anthropic';

/**
 * 필수 환경 변수 검증
 * 서비스 레벨에서 필수적으로 필요한 경우에만 에러를 발생시킵니다.
 */
export function requireEnv(key: string, serviceName: string): string {
    const value = process.env[key];
    if (!value) {
        throw new Error(
            `[${serviceName}] Missing required environment variable: ${key}\n` +
            `Set ${key} in your .env file.`
        );
    }
    return value;
}

/**
 * 선택적 환경 변수 (기본값 사용)
 */
export function getEnv(key: string, defaultValue: string = ''): string {
    return process.env[key] || defaultValue;
}

/**
 * 숫자형 환경 변수. 파싱할 수 없거나 0 이하이면 기본값을 사용합니다.
 */
export function getNumberEnv(key: string, defaultValue: number): number {
    const raw = process.env[key];
    if (!raw) return defaultValue;
    const parsed = Number(raw);
    return Number.isFinite(parsed) && parsed > 0 ? parsed : defaultValue;
}

function parseProvider(value: string): LlmProvider {
    return value.toLowerCase() === 'anthropic' ? 'anthropic' : 'openai';
}

export interface AppConfig {
    githubToken?: string;
    llmProvider: LlmProvider;
    openaiApiKey?: string;
    openaiModel: string;
    claudeApiKey?: string;
    claudeModel: string;
    recentActivityDays: number;
    analysisTimeoutMs: number;
    displaySegmentLimit: number;
    apiPort: number;
}

/**
 * 현재 process.env에서 설정 스냅샷을 만듭니다.
 */
export function loadConfig(): AppConfig {
    return {
        githubToken: getEnv('GITHUB_TOKEN') || undefined,
        llmProvider: parseProvider(getEnv('LLM_PROVIDER', 'openai')),
        openaiApiKey: getEnv('OPENAI_API_KEY') || undefined,
        openaiModel: getEnv('OPENAI_MODEL', 'gpt-4-turbo'),
        claudeApiKey: getEnv('CLAUDE_API_KEY') || undefined,
        claudeModel: getEnv('CLAUDE_MODEL', 'claude-3-5-sonnet-20240620'),
        recentActivityDays: getNumberEnv('RECENT_ACTIVITY_DAYS', 365),
        analysisTimeoutMs: getNumberEnv('ANALYSIS_TIMEOUT_MS', 300000),
        displaySegmentLimit: getNumberEnv('DISPLAY_SEGMENT_LIMIT', 4000),
        apiPort: getNumberEnv('API_PORT', 3001),
    };
}
