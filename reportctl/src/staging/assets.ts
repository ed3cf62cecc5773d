import fs from "node:fs";
import path from "node:path";
import { ioError } from "../errors.js";
import { contentName } from "./checksum.js";

/** Where staged images go, relative to the staging directory. */
export const IMAGES_SUBDIR = path.join("pdf-assets", "images");

/**
 * Copies files the document refers to into the staging directory the
 * document is built from, and returns the name to refer to them by.
 */
export interface AssetStager {
  stageImage(sourcePath: string): string;
  /** Stage an AsciiDoc file for `include::`, its first title at section `level`. */
  stageInclude(sourcePath: string, id: string, level: number): string;
}

const TITLE = /^(=+)[ \t]+\S/;

/**
 * Re-level the section titles in `content` so the first one sits at `level`
 * (0 = document title). Titles are only ever deepened.
 */
export function indentTitles(content: string, level: number): string {
  const lines = content.split("\n");
  const first = lines.map((l) => TITLE.exec(l)).find((m) => m !== null);
  if (!first) return content;

  const indent = level + 1 - first[1].length;
  if (indent <= 0) return content;

  const prefix = "=".repeat(indent);
  return lines.map((l) => (TITLE.test(l) ? prefix + l : l)).join("\n");
}

function readSource(sourcePath: string): Buffer {
  try {
    return fs.readFileSync(sourcePath);
  } catch (e) {
    throw ioError(sourcePath, e);
  }
}

function writeTarget(target: string, content: string | Buffer): void {
  try {
    fs.mkdirSync(path.dirname(target), { recursive: true });
    fs.writeFileSync(target, content);
  } catch (e) {
    throw ioError(target, e);
  }
}

/** Stages assets into a directory on disk. */
export class DirectoryStager implements AssetStager {
  constructor(private readonly objdir: string) {}

  /** Copy an image under a name derived from its content, so equal inputs stage identically. */
  stageImage(sourcePath: string): string {
    const content = readSource(sourcePath);
    const name = contentName(content, path.extname(sourcePath));
    writeTarget(path.join(this.objdir, IMAGES_SUBDIR, name), content);
    return name;
  }

  stageInclude(sourcePath: string, id: string, level: number): string {
    const content = readSource(sourcePath).toString("utf8");
    const name = `${id}.adoc`;
    writeTarget(path.join(this.objdir, name), indentTitles(content, level));
    return name;
  }
}
