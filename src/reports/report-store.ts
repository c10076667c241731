import fs from "fs";
import path from "path";
import { PersistenceError } from "../types/errors";
import { Logger } from "../logging/error-handler";
import { formatFileTimestamp } from "./timestamps";

export interface ReportStoreOptions {
  directory?: string;
  prefix?: string;
  now?: () => Date;
}

/**
 * Writes reports as `<directory>/<prefix>_<YYYY-MM-DD_HH-MM>.<ext>`.
 * Saves within the same minute target the same file; the last one wins.
 */
export class ReportStore {
  private readonly directory: string;
  private readonly prefix: string;
  private readonly now: () => Date;

  constructor(private readonly logger: Logger, opts: ReportStoreOptions = {}) {
    this.directory = opts.directory ?? "reports";
    this.prefix = opts.prefix ?? "sysreport";
    this.now = opts.now ?? (() => new Date());
  }

  saveText(content: string, directory: string = this.directory, prefix: string = this.prefix): string {
    const filePath = this.reportPath(directory, prefix, "txt", this.now());
    try {
      assertPlainPrefix(prefix);
      this.writeAtomic(filePath, content);
    } catch (error) {
      throw new PersistenceError("saveText", filePath, error);
    }
    this.logger.info(`Wrote text report: ${filePath}`);
    return filePath;
  }

  saveJSON<T extends object>(data: T, directory: string = this.directory, prefix: string = this.prefix): string {
    const now = this.now();
    const filePath = this.reportPath(directory, prefix, "json", now);
    try {
      assertPlainPrefix(prefix);
      const content = JSON.stringify({ ...data, timestamp: now.toISOString() }, null, 2);
      this.writeAtomic(filePath, content);
    } catch (error) {
      throw new PersistenceError("saveJSON", filePath, error);
    }
    this.logger.info(`Wrote JSON report: ${filePath}`);
    return filePath;
  }

  private reportPath(directory: string, prefix: string, ext: "txt" | "json", at: Date): string {
    return path.join(directory, `${prefix}_${formatFileTimestamp(at)}.${ext}`);
  }

  private writeAtomic(filePath: string, content: string): void {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    const tmpPath = `${filePath}.${process.pid}.tmp`;
    try {
      fs.writeFileSync(tmpPath, content, "utf8");
      fs.renameSync(tmpPath, filePath);
    } catch (error) {
      fs.rmSync(tmpPath, { force: true });
      throw error;
    }
  }
}

function assertPlainPrefix(prefix: string): void {
  if (prefix.length === 0 || /[\\/]|\.\./.test(prefix)) {
    throw new Error(`invalid report prefix "${prefix}"`);
  }
}
