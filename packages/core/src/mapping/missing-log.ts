/**
 * Tracks component values that had no metaobject GID, so they can be created
 * in Shopify later. Persisted to `<logDir>/missing_metaobjects.json`.
 */

import * as fs from "node:fs";
import * as path from "node:path";
import { z } from "zod";
import { logger } from "../utils/logger.js";
import { readJsonFile } from "../catalog/json-file.js";

export type MissingContext = Record<string, string>;

const missingEntrySchema = z.object({
  category: z.string(),
  value: z.string(),
  frequency: z.number().int().positive(),
  firstSeen: z.string(),
  lastSeen: z.string(),
  context: z.record(z.string()).default({}),
});
export type MissingEntry = z.infer<typeof missingEntrySchema>;

const missingLogFileSchema = z.object({
  lastUpdated: z.string().optional(),
  entries: z.record(z.record(missingEntrySchema)).default({}),
});

export interface SessionMiss {
  category: string;
  value: string;
  timestamp: string;
  context: MissingContext;
}

export interface MissingStatistics {
  totalCategories: number;
  totalUniqueValues: number;
  totalFrequency: number;
  mostFrequent: Array<Pick<MissingEntry, "category" | "value" | "frequency">>;
  categories: Record<
    string,
    { uniqueValues: number; totalFrequency: number; mostFrequent?: string }
  >;
  logFile?: string;
}

/**
 * Anything that wants to hear about unresolved values.
 */
export interface MissingRecorder {
  record(category: string, value: string, context?: MissingContext): void;
}

function ownValue<T>(record: Record<string, T>, key: string): T | undefined {
  return Object.hasOwn(record, key) ? record[key] : undefined;
}

// Plain assignment would treat "__proto__" as the prototype setter.
function setOwn<T>(record: Record<string, T>, key: string, value: T): void {
  Object.defineProperty(record, key, { value, enumerable: true, writable: true, configurable: true });
}

export class MissingMetaobjectLog implements MissingRecorder {
  private entries: Record<string, Record<string, MissingEntry>> = {};
  private session: SessionMiss[] = [];

  constructor(
    private readonly filePath?: string,
    private readonly now: () => Date = () => new Date()
  ) {
    this.load();
  }

  private load(): void {
    if (!this.filePath || !fs.existsSync(this.filePath)) return;

    const result = readJsonFile(this.filePath, missingLogFileSchema);
    if (!result.ok) {
      logger.warn("Could not load missing metaobject log, starting fresh", {
        file: this.filePath,
        error: result.error.message,
      });
      return;
    }
    this.entries = result.data.entries;
  }

  private save(): void {
    if (!this.filePath) return;

    const data = {
      lastUpdated: this.now().toISOString(),
      totalCategories: Object.keys(this.entries).length,
      totalValues: this.allEntries().length,
      entries: this.entries,
    };
    fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
    fs.writeFileSync(this.filePath, JSON.stringify(data, null, 2), "utf-8");
  }

  private allEntries(): MissingEntry[] {
    return Object.values(this.entries).flatMap((byValue) => Object.values(byValue));
  }

  record(category: string, value: string, context: MissingContext = {}): void {
    const timestamp = this.now().toISOString();
    let byValue = ownValue(this.entries, category);
    if (!byValue) {
      byValue = {};
      setOwn(this.entries, category, byValue);
    }
    const existing = ownValue(byValue, value);

    const entry: MissingEntry = existing
      ? {
          ...existing,
          frequency: existing.frequency + 1,
          lastSeen: timestamp,
          context: { ...existing.context, ...context },
        }
      : {
          category,
          value,
          frequency: 1,
          firstSeen: timestamp,
          lastSeen: timestamp,
          context,
        };
    setOwn(byValue, value, entry);

    this.session.push({ category, value, timestamp, context });
    this.save();

    logger.debug("Recorded missing metaobject", {
      category,
      value,
      frequency: entry.frequency,
    });
  }

  /**
   * Entries per category, most frequent (then most recent) first.
   */
  getSummary(): Record<string, MissingEntry[]> {
    const summary: Record<string, MissingEntry[]> = {};
    for (const [category, byValue] of Object.entries(this.entries)) {
      summary[category] = Object.values(byValue).sort(
        (a, b) => b.frequency - a.frequency || b.lastSeen.localeCompare(a.lastSeen)
      );
    }
    return summary;
  }

  getStatistics(top = 10): MissingStatistics {
    const all = this.allEntries();
    const categories: MissingStatistics["categories"] = {};

    for (const [category, byValue] of Object.entries(this.entries)) {
      const values = Object.values(byValue);
      const mostFrequent = values.reduce<MissingEntry | undefined>(
        (best, entry) => (!best || entry.frequency > best.frequency ? entry : best),
        undefined
      );
      categories[category] = {
        uniqueValues: values.length,
        totalFrequency: values.reduce((sum, entry) => sum + entry.frequency, 0),
        mostFrequent: mostFrequent?.value,
      };
    }

    return {
      totalCategories: Object.keys(this.entries).length,
      totalUniqueValues: all.length,
      totalFrequency: all.reduce((sum, entry) => sum + entry.frequency, 0),
      mostFrequent: [...all]
        .sort((a, b) => b.frequency - a.frequency)
        .slice(0, top)
        .map(({ category, value, frequency }) => ({ category, value, frequency })),
      categories,
      logFile: this.filePath,
    };
  }

  getSessionEntries(): SessionMiss[] {
    return [...this.session];
  }

  clearSession(): void {
    this.session = [];
  }

  /**
   * Forget everything, including the persisted file contents.
   */
  clear(): void {
    this.entries = {};
    this.session = [];
    this.save();
  }
}
