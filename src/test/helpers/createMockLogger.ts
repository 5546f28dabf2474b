import { vi, type Mock } from "vitest";
import type { Logger } from "../../cli";

export interface MockLogger extends Logger {
  log: Mock<(line: string) => void>;
  warn: Mock<(line: string) => void>;
  error: Mock<(line: string) => void>;
  /** Every line passed to log/warn/error, in call order */
  _lines: string[];
}

export function createMockLogger(): MockLogger {
  const lines: string[] = [];
  const record = (line: string) => {
    lines.push(line);
  };
  return {
    log: vi.fn<(line: string) => void>(record),
    warn: vi.fn<(line: string) => void>(record),
    error: vi.fn<(line: string) => void>(record),
    _lines: lines,
  };
}
