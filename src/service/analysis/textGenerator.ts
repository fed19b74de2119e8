/**
 * LLM 제공자(OpenAI, Claude)를 하나의 요청/응답 인터페이스로 감쌉니다.
 */
import OpenAI from "openai";
import Anthropic from "@anthropic-ai/sdk";
import { requireEnv, type AppConfig } from "../../../shared/config/env.js";

export interface GenerationRequest {
    model: string;
    system: string;
    prompt: string;
    temperature: number;
    maxTokens: number;
}

export interface TextGenerator {
    /** 로그에 쓰는 제공자 이름 */
    readonly provider: string;
    /** 제공자의 기본 모델 */
    readonly defaultModel: string;
    generate(request: GenerationRequest): Promise<string>;
}

export class OpenAITextGenerator implements TextGenerator {
    readonly provider = "openai";

    constructor(private readonly client: OpenAI, readonly defaultModel: string) {}

    async generate({ model, system, prompt, temperature, maxTokens }: GenerationRequest): Promise<string> {
        const response = await this.client.chat.completions.create({
            model,
            messages: [
                { role: "system", content: system },
                { role: "user", content: prompt },
            ],
            temperature,
            max_tokens: maxTokens,
        });

        const content = response.choices[0]?.message?.content;
        if (!content) {
            throw new Error("OpenAI returned an empty completion");
        }
        return content;
    }
}

export class AnthropicTextGenerator implements TextGenerator {
    readonly provider = "anthropic";

    constructor(private readonly client: Anthropic, readonly defaultModel: string) {}

    async generate({ model, system, prompt, temperature, maxTokens }: GenerationRequest): Promise<string> {
        const response = await this.client.messages.create({
            model,
            max_tokens: maxTokens,
            temperature,
            system,
            messages: [{ role: "user", content: prompt }],
        });

        for (const block of response.content) {
            if (block.type === "text" && block.text) {
                return block.text;
            }
        }
        throw new Error("Claude returned no text content");
    }
}

/**
 * LLM_PROVIDER에 맞는 generator를 만듭니다. API 키가 없으면 에러를 던집니다.
 */
export function createTextGenerator(config: AppConfig): TextGenerator {
    if (config.llmProvider === "anthropic") {
        const apiKey = config.claudeApiKey ?? requireEnv("CLAUDE_API_KEY", "TextGenerator");
        return new AnthropicTextGenerator(new Anthropic({ apiKey }), config.claudeModel);
    }
    const apiKey = config.openaiApiKey ?? requireEnv("OPENAI_API_KEY", "TextGenerator");
    return new OpenAITextGenerator(new OpenAI({ apiKey }), config.openaiModel);
}
