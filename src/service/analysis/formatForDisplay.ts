/**
 * 평가 결과를 화면 표시용으로 변환합니다.
 * 판정 톤, markdown 정리된 본문, 표시 단위(채팅 embed는 최대 4096자)에 맞게 나눈 segment를 만듭니다.
 */
import { RATING_LABELS, type AnalysisResult, type RatingScore } from "../../models/Assessment.js";

export const DEFAULT_SEGMENT_LIMIT = 4000;

export type VerdictTone = "positive" | "negative" | "caution" | "neutral";

export const TONE_STYLES: Record<VerdictTone, { color: number; emoji: string }> = {
    positive: { color: 0x2ecc71, emoji: "✅" },
    negative: { color: 0xe74c3c, emoji: "❌" },
    caution: { color: 0xf1c40f, emoji: "⚠️" },
    neutral: { color: 0x95a5a6, emoji: "" },
};

/**
 * "NOT LEGITIMATE"에도 "LEGITIMATE"가 들어 있으므로 부정 키워드를 먼저 확인합니다.
 */
export function classifyVerdict(verdict: string | undefined): VerdictTone {
    if (!verdict) return "neutral";
    const upper = verdict.toUpperCase();
    if (upper.includes("LARPING") || /NOT\s+LEGITIMATE|ILLEGITIMATE/.test(upper)) return "negative";
    if (upper.includes("BORDERLINE")) return "caution";
    if (upper.includes("LEGITIMATE")) return "positive";
    return "neutral";
}

/**
 * 제목(#)은 굵게 바꾸고 태그는 제거하며, 3개 이상 연속된 줄바꿈은 2개로 줄입니다.
 */
export function formatNarrative(narrative: string): string {
    return narrative
        .replace(/^[ \t]*#+[ \t]+(.+)$/gm, "**$1**")
        .replace(/<[^>]+>/g, "")
        .replace(/\n{3,}/g, "\n\n");
}

function lastBreakEnd(text: string, separator: string, start: number, end: number): number {
    const index = text.lastIndexOf(separator, end - separator.length);
    if (index < start) return -1;
    const breakEnd = index + separator.length;
    return breakEnd > start && breakEnd <= end ? breakEnd : -1;
}

/**
 * 텍스트를 최대 `limit`자의 연속된 segment로 나눕니다.
 * 범위 안의 마지막 문단 구분(빈 줄) 뒤에서 자르고, 없으면 마지막 줄바꿈 뒤, 그것도 없으면 limit 위치에서 자릅니다.
 * `segments.join("")`은 입력과 같습니다.
 */
export function splitIntoSegments(text: string, limit: number = DEFAULT_SEGMENT_LIMIT): string[] {
    if (!Number.isInteger(limit) || limit < 1) {
        throw new RangeError(`Segment limit must be a positive integer, got ${limit}`);
    }
    if (text.length <= limit) {
        return [text];
    }

    const segments: string[] = [];
    let position = 0;

    while (position < text.length) {
        const windowEnd = position + limit;
        if (windowEnd >= text.length) {
            segments.push(text.slice(position));
            break;
        }

        let splitAt = lastBreakEnd(text, "\n\n", position, windowEnd);
        if (splitAt === -1) {
            splitAt = lastBreakEnd(text, "\n", position, windowEnd);
        }
        if (splitAt === -1) {
            splitAt = windowEnd;
        }

        segments.push(text.slice(position, splitAt));
        position = splitAt;
    }

    return segments;
}

/**
 * "3/5" → "★★★☆☆"
 */
export function renderRatingStars(score: RatingScore): string {
    const value = Math.min(5, Math.max(0, Number.parseInt(score, 10) || 0));
    return "★".repeat(value) + "☆".repeat(5 - value);
}

export interface DisplayReport {
    title: string;
    url: string;
    tone: VerdictTone;
    color: number;
    author: {
        name: string;
        url: string;
        iconUrl: string | null;
    };
    infoLines: string[];
    verdictLine?: string;
    ratingLines: string[];
    /** 표시 단위로 미리 나눈 본문 */
    segments: string[];
    footer: string;
}

export interface DisplayOptions {
    /** 사용자가 요청한 주소 (제목 링크로 사용) */
    url: string;
    segmentLimit?: number;
}

export function buildDisplayReport(result: AnalysisResult, options: DisplayOptions): DisplayReport {
    const { report, assessment } = result;
    const tone = classifyVerdict(assessment.verdict);
    const { color, emoji } = TONE_STYLES[tone];

    const ratingLines: string[] = [];
    for (const label of RATING_LABELS) {
        const score = assessment.ratings[label];
        if (score) {
            ratingLines.push(`**${label}:** ${renderRatingStars(score)} (${score})`);
        }
    }

    const verdictLine = assessment.verdict
        ? (emoji ? `${emoji} **${assessment.verdict}**` : assessment.verdict)
        : undefined;

    return {
        title: `Analysis: ${report.info.name}`,
        url: options.url,
        tone,
        color,
        author: {
            name: `Repository by ${report.info.owner.login}`,
            url: report.info.owner.htmlUrl ?? options.url,
            iconUrl: report.info.owner.avatarUrl,
        },
        infoLines: [
            `⭐ **Stars:** ${report.info.stars}`,
            `🍴 **Forks:** ${report.info.forks}`,
            `📂 **Files:** ${report.structure.totalFiles}`,
            `🔄 **Last Updated:** ${report.info.updatedAt.slice(0, 10)}`,
        ],
        ...(verdictLine !== undefined && { verdictLine }),
        ratingLines,
        segments: splitIntoSegments(formatNarrative(assessment.narrative), options.segmentLimit),
        footer: "GitHub Analyzer | Crypto Due Diligence",
    };
}
