/**
 * RiverGauge-MCP: Bulletin Source
 *
 * Retrieves the raw bulletin text for one refresh. http(s) sources are
 * fetched with a timeout, ftp:// sources are downloaded into memory, and
 * file:// URLs and plain paths are read from disk. Failures come back as
 * ToolError values, never as thrown errors.
 */

import * as fs from "fs/promises";
import { Writable } from "stream";
import { fileURLToPath } from "url";
import { Client as BasicFtpClient, type AccessOptions } from "basic-ftp";
import type { ToolError } from "../types.js";
import { sha256, createToolError, now } from "../utils.js";

// ============================================================================
// Fetch Document
// ============================================================================

/** Signature of the global fetch, injectable for tests */
export type FetchFunction = (input: string, init?: RequestInit) => Promise<Response>;

/** The part of the basic-ftp Client used for downloads */
export interface FtpClient {
  access(options: AccessOptions): Promise<unknown>;
  downloadTo(destination: Writable, fromRemotePath: string): Promise<unknown>;
  close(): void;
}

/** Builds a client whose sockets time out after `timeoutMs` */
export type FtpClientFactory = (timeoutMs: number) => FtpClient;

export interface FetchDocumentInput {
  url: string;
  timeout_ms: number;
  user_agent?: string;
  /** @internal Inject a custom fetch (for testing) */
  _fetch?: FetchFunction;
  /** @internal Inject a custom FTP client (for testing) */
  _ftpClient?: FtpClientFactory;
}

export interface FetchDocumentResult {
  success: true;
  content: string;
  sha256: string;
  size_bytes: number;
  fetched_at: string;
}

type SourceKind = "http" | "ftp" | "file" | "unsupported";

/**
 * Classify a source string. Anything that does not parse as a URL with a
 * scheme is a local path.
 */
export function classifySource(source: string): SourceKind {
  let url: URL;
  try {
    url = new URL(source);
  } catch {
    return "file";
  }

  switch (url.protocol) {
    case "http:":
    case "https:":
      return "http";
    case "ftp:":
      return "ftp";
    case "file:":
      return "file";
    default:
      // Single-letter "schemes" are Windows drive letters
      return url.protocol.length === 2 ? "file" : "unsupported";
  }
}

export async function fetchDocument(input: FetchDocumentInput): Promise<FetchDocumentResult | ToolError> {
  const kind = classifySource(input.url);

  if (kind === "unsupported") {
    return createToolError("UNSUPPORTED_SOURCE", `Unsupported source scheme: ${input.url}`, {
      details: { url: input.url },
      recoverable: false,
      suggestion: "Use an http(s) or ftp URL, a file:// URL or a local path",
    });
  }

  const content = kind === "http"
    ? await fetchHttp(input)
    : kind === "ftp"
      ? await fetchFtp(input)
      : await readLocal(input.url);

  if (typeof content !== "string") {
    return content;
  }

  if (!content.trim()) {
    return createToolError("EMPTY_CONTENT", `Source returned no content: ${input.url}`, {
      details: { url: input.url },
      recoverable: true,
      suggestion: "Check that the bulletin is being published",
    });
  }

  return {
    success: true,
    content,
    sha256: sha256(content),
    size_bytes: Buffer.byteLength(content, "utf-8"),
    fetched_at: now(),
  };
}

// ============================================================================
// Transports
// ============================================================================

async function fetchHttp(input: FetchDocumentInput): Promise<string | ToolError> {
  const fetchFn = input._fetch ?? fetch;
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), input.timeout_ms);

  try {
    let response: Response;
    try {
      response = await fetchFn(input.url, {
        headers: input.user_agent ? { "User-Agent": input.user_agent } : undefined,
        signal: controller.signal,
      });
    } finally {
      clearTimeout(timeout);
    }

    if (!response.ok) {
      return createToolError("FETCH_FAILED", `HTTP ${response.status}: ${response.statusText}`, {
        details: { url: input.url, status: response.status },
        recoverable: response.status >= 500,
        suggestion: response.status >= 500 ? "Retry later" : "Check URL validity",
      });
    }

    return await response.text();
  } catch (err) {
    if (err instanceof Error && err.name === "AbortError") {
      return createToolError("FETCH_TIMEOUT", `Request timed out after ${input.timeout_ms}ms`, {
        details: { url: input.url },
        recoverable: true,
        suggestion: "Increase timeout_ms or check network",
      });
    }

    return createToolError("FETCH_FAILED", `Failed to fetch URL: ${err}`, {
      details: { url: input.url, error: String(err) },
      recoverable: true,
      suggestion: "Check URL and network connectivity",
    });
  }
}

/**
 * Anonymous login unless the URL carries credentials.
 */
async function fetchFtp(input: FetchDocumentInput): Promise<string | ToolError> {
  const url = new URL(input.url);
  const createClient = input._ftpClient ?? ((timeoutMs: number) => new BasicFtpClient(timeoutMs));
  const client = createClient(input.timeout_ms);

  const chunks: Buffer[] = [];
  const sink = new Writable({
    write(chunk: Buffer, _encoding, callback) {
      chunks.push(chunk);
      callback();
    },
  });

  try {
    await client.access({
      host: url.hostname,
      port: url.port ? Number(url.port) : 21,
      user: url.username ? decodeURIComponent(url.username) : "anonymous",
      password: url.password ? decodeURIComponent(url.password) : "anonymous@",
    });
    await client.downloadTo(sink, decodeURIComponent(url.pathname));
    return Buffer.concat(chunks).toString("utf-8");
  } catch (err) {
    // basic-ftp reports socket timeouts as "Timeout (control socket)" / "(data socket)"
    if (err instanceof Error && err.message.startsWith("Timeout")) {
      return createToolError("FETCH_TIMEOUT", `FTP transfer timed out after ${input.timeout_ms}ms`, {
        details: { url: input.url, error: err.message },
        recoverable: true,
        suggestion: "Increase timeout_ms or check network",
      });
    }

    return createToolError("FETCH_FAILED", `Failed to download via FTP: ${err}`, {
      details: { url: input.url, error: String(err) },
      recoverable: true,
      suggestion: "Check the FTP host, path and network connectivity",
    });
  } finally {
    client.close();
  }
}

async function readLocal(source: string): Promise<string | ToolError> {
  let filePath = source;
  try {
    if (source.startsWith("file:")) {
      filePath = fileURLToPath(source);
    }
    return await fs.readFile(filePath, "utf-8");
  } catch (error) {
    return createToolError("READ_FAILED", `Failed to read bulletin file: ${filePath}`, {
      details: { path: filePath, error: String(error) },
      recoverable: false,
      suggestion: "Verify the path is correct and the file exists",
    });
  }
}
