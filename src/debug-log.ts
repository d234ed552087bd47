import { appendFileSync, writeFileSync } from "fs";

export type DebugCategory = "request" | "response" | "info" | "error";

/**
 * Line-oriented trace written with --debug-file: `<epoch ms>;<category>;<content>`.
 * A target of "-" writes to stdout. The file is truncated on creation.
 */
export class DebugLogger {
  constructor(private readonly target?: string) {
    if (target && target !== "-") {
      writeFileSync(target, "");
    }
  }

  get enabled(): boolean {
    return Boolean(this.target);
  }

  log(category: DebugCategory, content: string): void {
    if (!this.target) return;

    const line = `${Date.now()};${category};${content}\n`;
    if (this.target === "-") {
      process.stdout.write(line);
    } else {
      appendFileSync(this.target, line);
    }
  }

  request(json: string): void {
    this.log("request", json);
  }

  response(content: string): void {
    this.log("response", content);
  }

  info(content: string): void {
    this.log("info", content);
  }

  error(content: string): void {
    this.log("error", content);
  }
}
