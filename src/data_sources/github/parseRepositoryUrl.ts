import type { ParsedReference, RepositoryReference } from "../../models/Repository.js";

// https://github.com/owner/repo[...]
const HTTPS_PATTERN = /github\.com\/([^/?#\s]+)\/([^/?#\s]+)/;
// git@github.com:owner/repo.git
const SSH_PATTERN = /github\.com:([^/\s]+)\/([^/\s]+)\.git/;

const NOT_FOUND: ParsedReference = { owner: null, name: null };

/**
 * 사용자가 입력한 GitHub 주소에서 owner/name을 추출합니다.
 * 두 형식 모두 매칭되지 않으면 예외 대신 { owner: null, name: null }을 반환합니다.
 *
 * @param locator - HTTPS 또는 SSH 형식의 레포지토리 주소
 */
export function parseRepositoryUrl(locator: string): ParsedReference {
    const https = HTTPS_PATTERN.exec(locator);
    if (https) {
        const name = https[2].replace(/\.git$/, "");
        return name ? { owner: https[1], name } : NOT_FOUND;
    }

    const ssh = SSH_PATTERN.exec(locator);
    if (ssh) {
        return { owner: ssh[1], name: ssh[2] };
    }

    return NOT_FOUND;
}

export function isResolved(parsed: ParsedReference): parsed is RepositoryReference {
    return parsed.owner !== null && parsed.name !== null;
}

export function isRepositoryUrl(locator: string): boolean {
    return isResolved(parseRepositoryUrl(locator));
}
