/**
 * 생성된 평가 텍스트에서 점수, 판정, 본문을 추출합니다.
 * 형식이 어긋나면 해당 필드만 비어 있을 뿐 예외를 던지지 않습니다.
 */
import type { RatingLabel, RatingScore, StructuredAssessment } from "../../models/Assessment.js";

// "**CODE QUALITY:** 3/5" 같은 markdown 강조를 허용
const RATING_PATTERNS: ReadonlyArray<[RatingLabel, string]> = [
    ["Code Quality", "CODE QUALITY"],
    ["Completeness", "COMPLETENESS"],
    ["Security", "SECURITY"],
    ["Originality", "ORIGINALITY"],
    ["Activity", "ACTIVITY"],
];

function ratingPattern(keyword: string, flags: string): RegExp {
    return new RegExp(`${keyword}[*_]*:[*_]*\\s*([1-5])\\s*/\\s*5`, flags);
}

// 줄 시작의 목록 기호, 번호, 제목 표시를 허용. 판정 내용은 다음 줄에 있어도 됨
const VERDICT_SOURCE = String.raw`^[ \t>#*_-]*(?:\d+[.)][ \t]*)?[*_]*VERDICT\b[*_]*:?[*_]*\s*[*_]*([^\s:*_].*?)$`;
const VERDICT_PATTERN = new RegExp(VERDICT_SOURCE, "im");
const VERDICT_LINE_PATTERN = new RegExp(VERDICT_SOURCE, "gim");

// 점수/판정을 지운 자리 표시. 이 표시가 있는 줄에서만 남은 목록 기호를 빈 줄로 봄
const REMOVED = "\u0000";
const MARKER_ONLY_LINE = /^[\s\-*_#>•.)\d]*$/;

export function extractRatings(text: string): StructuredAssessment["ratings"] {
    const ratings: StructuredAssessment["ratings"] = {};

    for (const [label, keyword] of RATING_PATTERNS) {
        const match = ratingPattern(keyword, "i").exec(text);
        if (match) {
            const score: RatingScore = `${Number(match[1])}/5`;
            ratings[label] = score;
        }
    }

    return ratings;
}

export function extractVerdict(text: string): string | undefined {
    const match = VERDICT_PATTERN.exec(text);
    if (!match) return undefined;

    const verdict = match[1].replace(/^[*_\s]+|[*_\s]+$/g, "");
    return verdict || undefined;
}

/**
 * 점수 항목과 판정 줄을 지우고 빈 줄을 제거한 나머지 텍스트
 * "- SECURITY: 3/5"처럼 지운 뒤 기호만 남은 줄도 제거하지만, 원래부터 숫자나 기호만 있던 줄은 유지합니다.
 */
export function extractNarrative(text: string): string {
    let remaining = text.split(REMOVED).join("");
    for (const [, keyword] of RATING_PATTERNS) {
        remaining = remaining.replace(ratingPattern(keyword, "gi"), REMOVED);
    }
    remaining = remaining.replace(VERDICT_LINE_PATTERN, REMOVED);

    return remaining
        .split("\n")
        .filter((line) => {
            if (!line.includes(REMOVED)) {
                return line.trim() !== "";
            }
            return !MARKER_ONLY_LINE.test(line.split(REMOVED).join(""));
        })
        .map((line) => line.split(REMOVED).join(""))
        .join("\n");
}

export function extractAssessment(rawText: string): StructuredAssessment {
    const verdict = extractVerdict(rawText);
    return {
        ...(verdict !== undefined && { verdict }),
        ratings: extractRatings(rawText),
        narrative: extractNarrative(rawText),
    };
}
