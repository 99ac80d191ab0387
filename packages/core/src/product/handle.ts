/**
 * Product handle generation: `{slug}-{YYMMDD}-{NNN}`, e.g. `asus-tuf-gaming-a15-250715-001`.
 * The trailing counter restarts every day and is persisted so handles stay unique across runs.
 */

import * as fs from "node:fs";
import * as path from "node:path";
import { logger } from "../utils/logger.js";
import { errorMessage } from "../utils/types.js";

/**
 * Lower-case, strip Latin accents and punctuation, collapse whitespace and
 * dashes. Kana and kanji are kept (voiced marks recombine under NFC); a title
 * with no letters or digits at all becomes "product".
 */
export function slugify(title: string): string {
  const slug = title
    .toLowerCase()
    .normalize("NFKD")
    .replace(/[\u0300-\u036f]/g, "")
    .normalize("NFC")
    .replace(/[^\p{L}\p{N}\s-]/gu, "")
    .trim()
    .replace(/\s+/g, "-")
    .replace(/-+/g, "-")
    .replace(/^-|-$/g, "");
  return slug || "product";
}

export function dateKey(date: Date): string {
  const yy = String(date.getFullYear() % 100).padStart(2, "0");
  const mm = String(date.getMonth() + 1).padStart(2, "0");
  const dd = String(date.getDate()).padStart(2, "0");
  return `${yy}${mm}${dd}`;
}

export function formatHandle(title: string, date: Date, counter: number): string {
  return `${slugify(title)}-${dateKey(date)}-${String(counter).padStart(3, "0")}`;
}

export interface HandleSource {
  next(title: string): string;
  preview(title: string): string;
}

/**
 * Per-day counter persisted as `{ "250715": 3 }`.
 * Without a file path the counter lives in memory only.
 */
export class HandleCounter implements HandleSource {
  private counters: Record<string, number>;

  constructor(
    private readonly filePath?: string,
    private readonly now: () => Date = () => new Date()
  ) {
    this.counters = this.load();
  }

  private load(): Record<string, number> {
    if (!this.filePath || !fs.existsSync(this.filePath)) return {};

    try {
      const raw: unknown = JSON.parse(fs.readFileSync(this.filePath, "utf-8"));
      const counters: Record<string, number> = {};
      if (raw && typeof raw === "object") {
        for (const [key, value] of Object.entries(raw)) {
          if (typeof value === "number" && Number.isInteger(value)) {
            counters[key] = value;
          }
        }
      }
      return counters;
    } catch (error) {
      logger.warn("Handle counter file unreadable, starting from zero", {
        file: this.filePath,
        error: errorMessage(error),
      });
      return {};
    }
  }

  private save(): void {
    if (!this.filePath) return;
    fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
    fs.writeFileSync(this.filePath, JSON.stringify(this.counters, null, 2), "utf-8");
  }

  current(): number {
    return this.counters[dateKey(this.now())] ?? 0;
  }

  /**
   * Consume the next counter value for today and return the handle.
   */
  next(title: string): string {
    const key = dateKey(this.now());
    const value = (this.counters[key] ?? 0) + 1;
    this.counters[key] = value;
    this.save();
    return formatHandle(title, this.now(), value);
  }

  /**
   * The handle `next` would return, without consuming the counter.
   */
  preview(title: string): string {
    return formatHandle(title, this.now(), this.current() + 1);
  }

  /**
   * Drop counters older than `daysToKeep` (and any unparseable keys).
   */
  cleanup(daysToKeep = 30): number {
    const today = this.now();
    let removed = 0;

    for (const key of Object.keys(this.counters)) {
      const match = /^(\d{2})(\d{2})(\d{2})$/.exec(key);
      const day = match
        ? new Date(2000 + Number(match[1]), Number(match[2]) - 1, Number(match[3]))
        : undefined;
      const ageDays = day
        ? (today.getTime() - day.getTime()) / 86_400_000
        : Number.POSITIVE_INFINITY;

      if (ageDays > daysToKeep) {
        delete this.counters[key];
        removed++;
      }
    }

    if (removed > 0) this.save();
    return removed;
  }
}
