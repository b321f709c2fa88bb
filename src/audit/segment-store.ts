import fs from "node:fs";
import path from "node:path";

/** Dumb byte sink for audit segments; the audit logger owns the format. */
export interface SegmentStore {
  append(key: string, data: string): void;
  read(key: string): string;
  list(): string[];
  remove(key: string): void;
}

export class MemorySegmentStore implements SegmentStore {
  private readonly segments = new Map<string, string>();

  append(key: string, data: string): void {
    this.segments.set(key, (this.segments.get(key) ?? "") + data);
  }

  read(key: string): string {
    return this.segments.get(key) ?? "";
  }

  list(): string[] {
    return [...this.segments.keys()].sort();
  }

  remove(key: string): void {
    this.segments.delete(key);
  }
}

export class FileSegmentStore implements SegmentStore {
  constructor(private readonly rootDir: string) {}

  segmentPath(key: string): string {
    return path.join(this.rootDir, `${key}.log`);
  }

  append(key: string, data: string): void {
    fs.mkdirSync(this.rootDir, { recursive: true });
    fs.appendFileSync(this.segmentPath(key), data, "utf8");
  }

  read(key: string): string {
    const file = this.segmentPath(key);
    return fs.existsSync(file) ? fs.readFileSync(file, "utf8") : "";
  }

  list(): string[] {
    if (!fs.existsSync(this.rootDir)) {
      return [];
    }
    return fs
      .readdirSync(this.rootDir)
      .filter((entry) => entry.endsWith(".log"))
      .map((entry) => entry.slice(0, -".log".length))
      .sort();
  }

  remove(key: string): void {
    fs.rmSync(this.segmentPath(key), { force: true });
  }
}
