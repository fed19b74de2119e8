import type { FailurePolicy } from "../../pipeline/failurePolicy.js";
import { describeError } from "../../pipeline/errors.js";
import { buildAnalysisPrompt, SYSTEM_PROMPT, type PromptInput } from "./prompt.js";
import type { TextGenerator } from "./textGenerator.js";

// 일관된 분석을 위해 낮은 temperature 사용
export const GENERATION_TEMPERATURE = 0.2;
export const GENERATION_MAX_TOKENS = 2000;

export const GENERATION_ERROR_PREFIX = "Error analyzing code with LLM: ";

export interface GenerateReportOptions {
    /** 생략 시 generator의 기본 모델 */
    model?: string;
}

/**
 * 프롬프트를 만들어 LLM을 한 번 호출하고 생성된 텍스트를 그대로 반환합니다.
 * 호출이 실패하면 예외 대신 에러 메시지 텍스트를 보고서로 반환합니다.
 */
export async function generateReport(
    generator: TextGenerator,
    input: PromptInput,
    policy: FailurePolicy,
    options: GenerateReportOptions = {}
): Promise<string> {
    const prompt = buildAnalysisPrompt(input);
    const model = options.model ?? generator.defaultModel;

    console.log(`🔄 Generating assessment with ${generator.provider} (${model}), prompt ${prompt.length} chars...`);

    const text = await policy.run(
        "generation",
        `${generator.provider}:${model}`,
        async () => {
            const generated = await generator.generate({
                model,
                system: SYSTEM_PROMPT,
                prompt,
                temperature: GENERATION_TEMPERATURE,
                maxTokens: GENERATION_MAX_TOKENS,
            });
            console.log(`✅ Assessment generated (${generated.length} chars)`);
            return generated;
        },
        (error) => `${GENERATION_ERROR_PREFIX}${describeError(error)}`
    );

    return text;
}
