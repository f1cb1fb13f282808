import fs from "node:fs";

export class LinksFileNotFoundError extends Error {
  constructor(readonly filePath: string) {
    super(`Links file '${filePath}' not found`);
    this.name = "LinksFileNotFoundError";
  }
}

export function parseLinks(raw: string): string[] {
  return raw
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line && !line.startsWith("#"));
}

export function readLinks(filePath: string): string[] {
  if (!fs.existsSync(filePath)) {
    throw new LinksFileNotFoundError(filePath);
  }
  return parseLinks(fs.readFileSync(filePath, "utf8"));
}
