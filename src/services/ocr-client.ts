/**
 * OCR API Client
 *
 * Client for the Mistral OCR REST API. A document is uploaded, exchanged for
 * a signed URL, and processed page by page into markdown plus optional
 * base64 images. Failures are raised as ExternalServiceError classified by
 * cause so the resilience layer can decide what to retry.
 */

import { z } from "zod";
import { CancelledError, ExternalServiceError, type ServiceFailure } from "./errors.js";

/** Default base URL for the OCR API */
const OCR_BASE_URL = "https://api.mistral.ai";

export interface OcrImage {
  id: string;
  /** Base64 payload without a data-URL prefix, null when not requested */
  base64: string | null;
  width: number | null;
  height: number | null;
}

export interface OcrPage {
  /** 0-based page index in the document */
  index: number;
  markdown: string;
  images: OcrImage[];
}

export interface OcrDocumentRef {
  fileId: string;
  url: string;
}

export interface OcrRequestOptions {
  /** 0-based pages; all pages when omitted */
  pages?: number[];
  includeImages: boolean;
  /** 0 means no limit */
  imageLimit: number;
  imageMinSize: number;
  signal?: AbortSignal;
}

/**
 * What converters need from an OCR backend. Implemented by the HTTP client
 * and by in-process fakes in tests.
 */
export interface OcrService {
  /** Identifies the endpoint for circuit breaking */
  readonly endpoint: string;
  upload(content: Uint8Array, filename: string, signal?: AbortSignal): Promise<OcrDocumentRef>;
  process(ref: OcrDocumentRef, options: OcrRequestOptions): Promise<OcrPage[]>;
  /** Delete the uploaded document; best effort */
  release(ref: OcrDocumentRef): Promise<void>;
}

const uploadResponseSchema = z.object({ id: z.string().min(1) });
const signedUrlResponseSchema = z.object({ url: z.string().min(1) });
const ocrResponseSchema = z.object({
  pages: z.array(
    z.object({
      index: z.number().int(),
      markdown: z.string().default(""),
      images: z
        .array(
          z.object({
            id: z.string(),
            top_left_x: z.number().nullish(),
            top_left_y: z.number().nullish(),
            bottom_right_x: z.number().nullish(),
            bottom_right_y: z.number().nullish(),
            image_base64: z.string().nullish(),
          })
        )
        .default([]),
    })
  ),
});

/**
 * Classify an HTTP status.
 */
export function failureForStatus(status: number): ServiceFailure {
  if (status === 408) return "timeout";
  if (status === 429) return "rate_limit";
  if (status >= 500) return "server";
  return "client";
}

function stripDataUrl(value: string): string {
  const comma = value.indexOf(",");
  return value.startsWith("data:") && comma !== -1 ? value.slice(comma + 1) : value;
}

function extent(from: number | null | undefined, to: number | null | undefined): number | null {
  return from === null || from === undefined || to === null || to === undefined ? null : Math.abs(to - from);
}

/**
 * Validate a response body. A body of the wrong shape is the server's fault.
 */
function parseResponse<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, what: string, raw: unknown): T {
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    throw new ExternalServiceError("server", `OCR ${what} response malformed: ${parsed.error.issues[0]?.message ?? "unknown"}`);
  }
  return parsed.data;
}

interface RequestSpec {
  method: "GET" | "POST" | "DELETE";
  headers?: Record<string, string>;
  body?: string | FormData;
}

interface TimedSignal {
  signal: AbortSignal;
  timedOut(): boolean;
  dispose(): void;
}

/**
 * Signal that aborts on the caller's signal or after `timeoutMs`.
 */
function timedSignal(timeoutMs: number, outer?: AbortSignal): TimedSignal {
  const controller = new AbortController();
  let expired = false;
  const timer = setTimeout(() => {
    expired = true;
    controller.abort();
  }, timeoutMs);
  const onAbort = () => controller.abort();
  if (outer?.aborted) controller.abort();
  outer?.addEventListener("abort", onAbort, { once: true });
  return {
    signal: controller.signal,
    timedOut: () => expired,
    dispose: () => {
      clearTimeout(timer);
      outer?.removeEventListener("abort", onAbort);
    },
  };
}

/**
 * Mistral OCR API client.
 */
export class MistralOcrClient implements OcrService {
  private baseUrl: string;

  constructor(
    private readonly apiKey: string,
    private readonly model: string = "mistral-ocr-latest",
    private readonly timeoutMs: number = 30_000,
    baseUrl: string = OCR_BASE_URL
  ) {
    this.baseUrl = baseUrl.replace(/\/+$/, "");
  }

  get endpoint(): string {
    return `${this.baseUrl}/v1/ocr`;
  }

  /**
   * Upload a document for OCR. When the signed URL cannot be obtained the
   * uploaded file is deleted before the error propagates, so a retried
   * upload leaves nothing behind.
   */
  async upload(content: Uint8Array, filename: string, signal?: AbortSignal): Promise<OcrDocumentRef> {
    const form = new FormData();
    form.append("purpose", "ocr");
    form.append("file", new Blob([content]), filename);

    const uploaded = parseResponse(
      uploadResponseSchema,
      "upload",
      await this.request("upload", "/v1/files", { method: "POST", body: form }, signal)
    );
    try {
      const signed = parseResponse(
        signedUrlResponseSchema,
        "signed URL",
        await this.request("signed URL", `/v1/files/${encodeURIComponent(uploaded.id)}/url?expiry=24`, { method: "GET" }, signal)
      );
      return { fileId: uploaded.id, url: signed.url };
    } catch (err) {
      await this.release({ fileId: uploaded.id, url: "" });
      throw err;
    }
  }

  /**
   * Run OCR on an uploaded document.
   */
  async process(ref: OcrDocumentRef, options: OcrRequestOptions): Promise<OcrPage[]> {
    const body: Record<string, unknown> = {
      model: this.model,
      document: { type: "document_url", document_url: ref.url },
      include_image_base64: options.includeImages,
      image_min_size: options.imageMinSize,
    };
    if (options.imageLimit > 0) body.image_limit = options.imageLimit;
    if (options.pages) body.pages = options.pages;

    const raw = await this.request(
      "OCR",
      "/v1/ocr",
      {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify(body),
      },
      options.signal
    );

    return parseResponse(ocrResponseSchema, "processing", raw).pages.map((page) => ({
      index: page.index,
      markdown: page.markdown,
      images: page.images.map((image) => ({
        id: image.id,
        base64: image.image_base64 ? stripDataUrl(image.image_base64) : null,
        width: extent(image.top_left_x, image.bottom_right_x),
        height: extent(image.top_left_y, image.bottom_right_y),
      })),
    }));
  }

  /**
   * Delete an uploaded document. Failures are logged, not raised.
   */
  async release(ref: OcrDocumentRef): Promise<void> {
    try {
      await this.request("delete", `/v1/files/${encodeURIComponent(ref.fileId)}`, { method: "DELETE" });
    } catch (err) {
      console.warn(`[OCR] Failed to delete uploaded file ${ref.fileId}:`, err);
    }
  }

  private async request(
    what: string,
    path: string,
    init: RequestSpec,
    signal?: AbortSignal
  ): Promise<unknown> {
    const timed = timedSignal(this.timeoutMs, signal);
    try {
      const response = await fetch(`${this.baseUrl}${path}`, {
        ...init,
        headers: { ...init.headers, Authorization: `Bearer ${this.apiKey}`, Accept: "application/json" },
        signal: timed.signal,
      });

      if (!response.ok) {
        const detail = (await response.text().catch(() => "")).slice(0, 200);
        throw new ExternalServiceError(
          failureForStatus(response.status),
          `OCR ${what} request failed: ${response.status}${detail ? ` ${detail}` : ""}`,
          { status: response.status }
        );
      }
      return await response.json();
    } catch (err) {
      if (err instanceof ExternalServiceError) throw err;
      if (timed.timedOut()) {
        throw new ExternalServiceError("timeout", `OCR ${what} request timed out after ${this.timeoutMs}ms`, { cause: err });
      }
      if (signal?.aborted) {
        throw new CancelledError(`OCR ${what} request cancelled`);
      }
      if (err instanceof SyntaxError) {
        throw new ExternalServiceError("server", `OCR ${what} response was not JSON`, { cause: err });
      }
      throw new ExternalServiceError("network", `OCR ${what} request failed: ${err instanceof Error ? err.message : String(err)}`, { cause: err });
    } finally {
      timed.dispose();
    }
  }
}
