// File type classification
// - single source for type names and their extensions
// - table order is the match order (first match wins)

import path from "node:path";

export const FILE_TYPE_EXTENSIONS = {
  python: [".py", ".pyi", ".pyx", ".pxd"],
  javascript: [".js", ".mjs", ".cjs"],
  typescript: [".ts", ".tsx", ".d.ts"],
  kotlin: [".kt", ".kts"],
  java: [".java"],
  go: [".go"],
  rust: [".rs"],
  cpp: [".cpp", ".cxx", ".cc", ".hpp", ".hxx", ".h++"],
  c: [".c", ".h"],
  csharp: [".cs"],
  ruby: [".rb"],
  php: [".php"],
  swift: [".swift"],
  markdown: [".md", ".markdown"],
  json: [".json"],
  yaml: [".yml", ".yaml"],
  xml: [".xml"],
  html: [".html", ".htm"],
  css: [".css", ".scss", ".sass", ".less"],
} as const satisfies Record<string, readonly string[]>;

export type KnownFileType = keyof typeof FILE_TYPE_EXTENSIONS;
export type FileType = KnownFileType | "other";

const KNOWN_FILE_TYPES: readonly KnownFileType[] = [
  "python",
  "javascript",
  "typescript",
  "kotlin",
  "java",
  "go",
  "rust",
  "cpp",
  "c",
  "csharp",
  "ruby",
  "php",
  "swift",
  "markdown",
  "json",
  "yaml",
  "xml",
  "html",
  "css",
];

export const FILE_TYPES: readonly FileType[] = [...KNOWN_FILE_TYPES, "other"];

const FILE_TYPE_BY_NAME: ReadonlyMap<string, FileType> = new Map(
  FILE_TYPES.map((type) => [type, type]),
);

export function parseFileType(name: string): FileType | null {
  return FILE_TYPE_BY_NAME.get(name.trim().toLowerCase()) ?? null;
}

export function fileExtension(filePath: string): string {
  // path.extname: ".bashrc" -> "", "types.d.ts" -> ".ts"
  return path.posix.extname(filePath.split(path.sep).join(path.posix.sep)).toLowerCase();
}

export function classifyFile(filePath: string): FileType {
  const ext = fileExtension(filePath);
  if (!ext) return "other";

  for (const type of KNOWN_FILE_TYPES) {
    const extensions: readonly string[] = FILE_TYPE_EXTENSIONS[type];
    if (extensions.includes(ext)) return type;
  }

  return "other";
}

export function fileTypeExtensionTable(): Record<string, string[]> {
  return Object.fromEntries(
    KNOWN_FILE_TYPES.map((type) => [type, [...FILE_TYPE_EXTENSIONS[type]]]),
  );
}
