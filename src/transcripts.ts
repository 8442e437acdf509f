import fs from "node:fs/promises";
import path from "node:path";
import { randomUUID } from "node:crypto";
import fg from "fast-glob";
import { NotFoundError, ValidationError } from "./errors";

const ID_PATTERN = /^[A-Za-z0-9_-]{1,128}$/;

/**
 * Flat-file transcript repository: each structured transcript lives at
 * `<dir>/<id>.txt`. Ids are restricted to a filename-safe alphabet so a
 * caller-supplied id can never escape the directory.
 */
export class TranscriptStore {
  private readonly dir: string;

  public constructor(dir: string) {
    this.dir = path.resolve(dir);
  }

  public static isValidId(id: string): boolean {
    return ID_PATTERN.test(id);
  }

  /** @throws {ValidationError} For ids outside `[A-Za-z0-9_-]{1,128}`. */
  public pathFor(id: string): string {
    if (!TranscriptStore.isValidId(id)) throw new ValidationError(`Invalid transcript id: ${id}`);
    return path.join(this.dir, `${id}.txt`);
  }

  /** Persist a transcript, generating a UUID when no id is given. */
  public async save(text: string, id: string = randomUUID()): Promise<string> {
    const file = this.pathFor(id);
    await fs.mkdir(this.dir, { recursive: true });
    await fs.writeFile(file, text, "utf8");
    console.error(`[Transcripts] Saved ${id} (${text.length} chars)`);
    return id;
  }

  /** @throws {NotFoundError} If no transcript is stored under `id`. */
  public async load(id: string): Promise<string> {
    try {
      return await fs.readFile(this.pathFor(id), "utf8");
    } catch (e) {
      if (isMissing(e)) throw new NotFoundError("Transcript");
      throw e;
    }
  }

  /** Ids of all stored transcripts, sorted. */
  public async list(): Promise<string[]> {
    try {
      await fs.access(this.dir);
    } catch (e) {
      if (isMissing(e)) return [];
      throw e;
    }
    const files = await fg("*.txt", { cwd: this.dir, onlyFiles: true });
    return files
      .map((f) => f.slice(0, -".txt".length))
      .filter((id) => TranscriptStore.isValidId(id))
      .sort();
  }
}

function isMissing(e: unknown): boolean {
  return e instanceof Error && "code" in e && e.code === "ENOENT";
}
