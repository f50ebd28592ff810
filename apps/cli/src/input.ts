import { readFile } from "node:fs/promises";
import { extname } from "node:path";
import {
  MalformedInputError,
  PuzzleGrid,
  parsePuzzleJson,
  parsePuzzleString,
} from "@nineset/core";

export interface PuzzleSource {
  /** 81-character puzzle given on the command line */
  puzzle?: string;
  /** Path to a text or .json puzzle file */
  file?: string;
}

/** JSON when the text opens with "[", the 81-character form otherwise. */
export function parsePuzzleText(text: string): PuzzleGrid {
  return text.trimStart().startsWith("[")
    ? parsePuzzleJson(text)
    : parsePuzzleString(text);
}

async function readStream(stream: NodeJS.ReadableStream): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(typeof chunk === "string" ? Buffer.from(chunk) : chunk);
  }
  return Buffer.concat(chunks).toString("utf-8");
}

/**
 * Read a puzzle from the argument, a file, or stdin, in that order of
 * preference. Throws MalformedInputError when none is given.
 */
export async function readPuzzle(
  source: PuzzleSource,
  stdin: NodeJS.ReadableStream & { isTTY?: boolean } = process.stdin,
): Promise<PuzzleGrid> {
  if (source.puzzle !== undefined && source.file !== undefined) {
    throw new MalformedInputError(["give a puzzle argument or --file, not both"]);
  }
  if (source.file !== undefined) {
    const text = await readFile(source.file, "utf-8");
    return extname(source.file).toLowerCase() === ".json"
      ? parsePuzzleJson(text)
      : parsePuzzleText(text);
  }
  if (source.puzzle !== undefined) {
    return parsePuzzleText(source.puzzle);
  }
  if (stdin.isTTY) {
    throw new MalformedInputError([
      "no puzzle given: pass it as an argument, with --file, or on stdin",
    ]);
  }
  return parsePuzzleText(await readStream(stdin));
}
