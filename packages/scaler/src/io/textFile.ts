import { mkdir, readFile, writeFile } from "node:fs/promises";
import path from "node:path";

export type TextEncoding = "utf8" | "latin1";

export interface TextFile {
  content: string;
  encoding: TextEncoding;
}

const strictUtf8 = new TextDecoder("utf-8", { fatal: true, ignoreBOM: true });

/**
 * Decodes as UTF-8 when the bytes are valid UTF-8 (a BOM is kept in the
 * content), otherwise as Latin-1, which maps every byte to one code point and
 * therefore cannot fail. Writing the content back with the same encoding
 * reproduces the original bytes.
 */
export function decodeText(buffer: Buffer): TextFile {
  try {
    return { content: strictUtf8.decode(buffer), encoding: "utf8" };
  } catch {
    return { content: buffer.toString("latin1"), encoding: "latin1" };
  }
}

export function encodeText(file: TextFile): Buffer {
  return Buffer.from(file.content, file.encoding);
}

export async function readTextFile(filePath: string): Promise<TextFile> {
  return decodeText(await readFile(filePath));
}

export async function writeTextFile(filePath: string, file: TextFile): Promise<void> {
  await mkdir(path.dirname(filePath), { recursive: true });
  await writeFile(filePath, encodeText(file));
}

/** Relative path with `/` separators, used as the stable key of a file. */
export function toPosixRelative(root: string, filePath: string): string {
  return path.relative(root, filePath).split(path.sep).join("/");
}
