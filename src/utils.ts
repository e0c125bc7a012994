/**
 * RiverGauge-MCP: Core Utilities
 *
 * Hashing, file operations, ID generation, errors and event logging.
 */

import { createHash } from "crypto";
import { v7 as uuidv7 } from "uuid";
import * as fs from "fs/promises";
import * as path from "path";
import type { EventLogEntry, ErrorCode, ToolError } from "./types.js";

// ============================================================================
// Hashing Utilities (Deterministic)
// ============================================================================

/**
 * Generate SHA256 hash of content
 */
export function sha256(content: string | Buffer): string {
  return createHash("sha256").update(content).digest("hex");
}

// ============================================================================
// ID Generation
// ============================================================================

/**
 * Generate time-ordered UUID v7 for refresh cycles
 */
export function generatePollId(): string {
  return uuidv7();
}

// ============================================================================
// File Operations
// ============================================================================

/**
 * Ensure a directory exists
 */
export async function ensureDir(dirPath: string): Promise<void> {
  await fs.mkdir(dirPath, { recursive: true });
}

/**
 * Check if a path exists
 */
export async function pathExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

/**
 * Write JSONL file (append mode)
 */
export async function appendJsonl(filePath: string, records: unknown[]): Promise<void> {
  const lines = records.map(r => JSON.stringify(r)).join("\n") + "\n";
  await fs.appendFile(filePath, lines, "utf-8");
}

/**
 * Read JSONL file
 */
export async function readJsonl<T>(filePath: string): Promise<T[]> {
  const content = await fs.readFile(filePath, "utf-8");
  return content
    .split("\n")
    .filter(line => line.trim())
    .map(line => JSON.parse(line) as T);
}

/**
 * Read JSON file as an untyped value; callers validate with zod
 */
export async function readJson(filePath: string): Promise<unknown> {
  const content = await fs.readFile(filePath, "utf-8");
  return JSON.parse(content);
}

// ============================================================================
// Error Handling
// ============================================================================

/**
 * Create a standardized tool error
 */
export function createToolError(
  code: ErrorCode,
  message: string,
  options?: {
    details?: unknown;
    recoverable?: boolean;
    suggestion?: string;
  }
): ToolError {
  return {
    success: false,
    isError: true,
    code,
    message,
    details: options?.details,
    recoverable: options?.recoverable ?? false,
    suggestion: options?.suggestion,
  };
}

/**
 * Narrow a tool result to its error branch
 */
export function isToolError(value: unknown): value is ToolError {
  return typeof value === "object"
    && value !== null
    && "isError" in value
    && value.isError === true;
}

/**
 * Format error for MCP response
 */
export function formatErrorResponse(error: ToolError): { isError: true; content: Array<{ type: "text"; text: string }> } {
  const text = [
    `Error: ${error.code}`,
    error.message,
    error.suggestion ? `Suggestion: ${error.suggestion}` : "",
    error.details ? `Details: ${JSON.stringify(error.details)}` : "",
  ].filter(Boolean).join("\n");

  return {
    isError: true,
    content: [{ type: "text", text }],
  };
}

// ============================================================================
// Logging
// ============================================================================

/**
 * Create an event log entry
 */
export function createLogEntry(
  level: EventLogEntry["level"],
  sensor: string,
  tool: string,
  message: string,
  data?: unknown
): EventLogEntry {
  return {
    timestamp: new Date().toISOString(),
    level,
    sensor,
    tool,
    message,
    data,
  };
}

/**
 * Sink for sensor events. EventLogger writes NDJSON; tests pass their own.
 */
export interface GaugeLogger {
  log(entry: EventLogEntry): Promise<void>;
}

/**
 * Logger writing events.ndjson / errors.ndjson under a logs directory
 */
export class EventLogger implements GaugeLogger {
  private logsDir: string;

  constructor(logsDir: string) {
    this.logsDir = logsDir;
  }

  async init(): Promise<void> {
    await ensureDir(this.logsDir);
  }

  async log(entry: EventLogEntry): Promise<void> {
    const file = entry.level === "error" ? "errors.ndjson" : "events.ndjson";
    await appendJsonl(path.join(this.logsDir, file), [entry]);
  }
}

// ============================================================================
// Time Utilities
// ============================================================================

/**
 * Get current ISO8601 timestamp
 */
export function now(): string {
  return new Date().toISOString();
}

/**
 * Measure execution time
 */
export async function timed<T>(fn: () => Promise<T>): Promise<{ result: T; duration_ms: number }> {
  const start = performance.now();
  const result = await fn();
  const duration_ms = Math.round(performance.now() - start);
  return { result, duration_ms };
}
