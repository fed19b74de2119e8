import type { FileEntry } from "../../models/File.js";
import type { DirectoryNode, RepoStructure } from "../../models/Structure.js";

/**
 * 파일 경로의 확장자 (소문자, 점 포함)
 * 확장자가 없거나 ".gitignore"처럼 점으로 시작하는 이름만 있으면 ""를 반환합니다.
 */
export function fileExtension(path: string): string {
    const base = path.slice(path.lastIndexOf("/") + 1).toLowerCase();
    const dot = base.lastIndexOf(".");
    if (dot <= 0) return "";
    // "..foo" 같은 선행 점은 확장자로 보지 않음
    if (/^\.+$/.test(base.slice(0, dot))) return "";
    return base.slice(dot);
}

/**
 * 프로토타입이 없는 빈 객체. "constructor", "__proto__" 같은 디렉토리 이름도 일반 키로 다룹니다.
 */
function emptyRecord<T>(): Record<string, T> {
    return Object.create(null);
}

function createNode(): DirectoryNode {
    return { children: emptyRecord<DirectoryNode>() };
}

function insertDirectories(tree: DirectoryNode, path: string): void {
    const parts = path.split("/");
    let current = tree;

    // 마지막 segment(파일명)는 트리에 넣지 않음
    for (const part of parts.slice(0, -1)) {
        if (!Object.hasOwn(current.children, part)) {
            current.children[part] = createNode();
        }
        current = current.children[part];
    }
}

/**
 * 파일 목록으로 확장자별 개수와 디렉토리 트리를 만듭니다. I/O 없음.
 */
export function analyzeStructure(files: FileEntry[]): RepoStructure {
    const fileTypeCounts = emptyRecord<number>();
    const directoryTree = createNode();

    for (const file of files) {
        const extension = fileExtension(file.path);
        const count = Object.hasOwn(fileTypeCounts, extension) ? fileTypeCounts[extension] : 0;
        fileTypeCounts[extension] = count + 1;
        insertDirectories(directoryTree, file.path);
    }

    return {
        fileTypeCounts,
        totalFiles: files.length,
        directoryTree,
    };
}

/**
 * 디렉토리 트리를 들여쓰기된 텍스트로 변환합니다 (CLI 출력용).
 */
export function renderDirectoryTree(node: DirectoryNode, depth: number = 0, maxDepth: number = 3): string[] {
    if (depth >= maxDepth) return [];
    const lines: string[] = [];
    for (const [name, child] of Object.entries(node.children)) {
        lines.push(`${"  ".repeat(depth)}${name}/`);
        lines.push(...renderDirectoryTree(child, depth + 1, maxDepth));
    }
    return lines;
}
