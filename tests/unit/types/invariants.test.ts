/**
 * Property-based tests for pipeline invariants.
 *
 * Ordered from the decisions that guard the filesystem down to the
 * bookkeeping that reports on them.
 */

import { describe, it, expect } from "vitest";
import fc from "fast-check";
import { backoffDelay, backoffSchedule } from "../../../src/services/backoff.js";
import { summarizeError, ValidationError } from "../../../src/services/errors.js";
import {
  buildGeneratedName,
  formatTimestamp,
  messageKeyFor,
  NameRegistry,
  sanitizeFilename,
} from "../../../src/services/filenames.js";
import { reportStatus, summarize } from "../../../src/services/orchestrator.js";
import { assertAllowed, hasPathTraversal, validate } from "../../../src/services/security-validator.js";
import { parseCircuitState } from "../../../src/storage/circuit-state.js";
import { parseMessageRecord } from "../../../src/storage/message-records.js";
import { ATTACHMENT_STATUSES } from "../../../src/types/index.js";
import type { ValidationSubject } from "../../../src/types/index.js";
import {
  arbBackoffPolicy,
  arbCircuitState,
  arbContent,
  arbDate,
  arbExtension,
  arbIdentifier,
  arbMessageRecord,
  arbOutcomes,
  arbSafeStem,
  arbSecurityPolicy,
  arbTraversalName,
  arbUntrustedName,
} from "./generators.js";

const arbContentType = fc.option(fc.constantFrom("application/pdf", "text/plain", "image/png", "application/octet-stream"), {
  nil: undefined,
});

function subject(name: string, content: Uint8Array, contentType?: string): ValidationSubject {
  return { name, content, ...(contentType === undefined ? {} : { contentType }) };
}

const UNSAFE_CHARACTERS = /[\\/:*?"<>|\x00-\x1f\x7f]/;

// =============================================================================
// 1. SECURITY DECISIONS
// =============================================================================

describe("Security validation", () => {
  it("never throws and sets a violation exactly when denying", () => {
    fc.assert(
      fc.property(arbUntrustedName, arbContent, arbContentType, arbSecurityPolicy, (name, content, type, policy) => {
        const outcome = validate(subject(name, content, type), policy);
        expect(outcome.allowed).toBe(outcome.violation === undefined);
        expect(outcome.size).toBe(content.length);
        expect(outcome.maxBytes).toBe(policy.maxBytes);
      })
    );
  });

  it("denies every path traversal before any other check", () => {
    fc.assert(
      fc.property(arbTraversalName, arbContent, arbSecurityPolicy, (name, content, policy) => {
        expect(hasPathTraversal(name)).toBe(true);
        expect(validate(subject(name, content), policy).violation).toBe("path_traversal");
      })
    );
  });

  it("denies content over the size limit", () => {
    fc.assert(
      fc.property(
        arbSafeStem,
        arbExtension,
        arbSecurityPolicy.chain((policy) =>
          fc.tuple(fc.constant(policy), fc.uint8Array({ minLength: policy.maxBytes + 1, maxLength: policy.maxBytes + 64 }))
        ),
        (stem, ext, [policy, content]) => {
          expect(validate(subject(stem + ext, content), policy).violation).toBe("file_size");
        }
      )
    );
  });

  it("denies blocked extensions in every mode", () => {
    const arbBlocked = arbSecurityPolicy
      .filter((policy) => policy.blockedExtensions.length > 0)
      .chain((policy) =>
        fc.tuple(
          fc.constant(policy),
          fc.constantFrom(...policy.blockedExtensions),
          fc.uint8Array({ maxLength: policy.maxBytes })
        )
      );

    fc.assert(
      fc.property(arbSafeStem, arbBlocked, (stem, [policy, ext, content]) => {
        const outcome = validate(subject(stem + ext, content), policy);
        expect(outcome.allowed).toBe(false);
        expect(outcome.violation).toBe("blocked_extension");
      })
    );
  });

  it("only allows names whose extension passes both lists", () => {
    fc.assert(
      fc.property(arbUntrustedName, arbContent, arbContentType, arbSecurityPolicy, (name, content, type, policy) => {
        const outcome = validate(subject(name, content, type), policy);
        if (!outcome.allowed) return;
        expect(policy.allowedExtensions).toContain(outcome.extension);
        expect(policy.blockedExtensions).not.toContain(outcome.extension);
        expect(outcome.size).toBeLessThanOrEqual(policy.maxBytes);
        expect(hasPathTraversal(name)).toBe(false);
      })
    );
  });

  it("downgrades signature mismatches to warnings in permissive mode", () => {
    fc.assert(
      fc.property(arbUntrustedName, arbContent, arbSecurityPolicy, (name, content, policy) => {
        const outcome = validate(subject(name, content), { ...policy, mode: "permissive" });
        expect(outcome.violation).not.toBe("type_mismatch");
      })
    );
  });

  it("assertAllowed throws exactly for denials", () => {
    fc.assert(
      fc.property(arbUntrustedName, arbContent, arbSecurityPolicy, (name, content, policy) => {
        const outcome = validate(subject(name, content), policy);
        let thrown: unknown;
        try {
          assertAllowed(outcome);
        } catch (err) {
          thrown = err;
        }
        if (outcome.allowed) {
          expect(thrown).toBeUndefined();
        } else {
          expect(thrown).toBeInstanceOf(ValidationError);
          expect(thrown instanceof ValidationError ? thrown.violation : null).toBe(outcome.violation);
        }
      })
    );
  });
});

// =============================================================================
// 2. GENERATED NAMES
// =============================================================================

describe("Filenames", () => {
  it("sanitized names are safe to join onto a directory", () => {
    fc.assert(
      fc.property(arbUntrustedName, (name) => {
        const safe = sanitizeFilename(name);
        expect(safe.length).toBeGreaterThan(0);
        expect(safe.length).toBeLessThanOrEqual(255);
        expect(safe).not.toMatch(UNSAFE_CHARACTERS);
        expect(safe).not.toMatch(/^[. ]/);
        expect(hasPathTraversal(safe)).toBe(false);
      })
    );
  });

  it("generated names carry the message key and zero-padded counter", () => {
    fc.assert(
      fc.property(arbUntrustedName, arbIdentifier, fc.integer({ min: 1, max: 500 }), (name, messageId, counter) => {
        const key = messageKeyFor(messageId);
        const generated = buildGeneratedName(name, key, counter, ".bin");
        expect(generated).toContain(`_${key}_${String(counter).padStart(2, "0")}`);
        expect(generated).not.toMatch(/[\\/]/);
        expect(hasPathTraversal(generated)).toBe(false);
      })
    );
  });

  it("the name registry never hands out a name twice", () => {
    fc.assert(
      fc.property(fc.array(fc.constantFrom("a.pdf", "a-2.pdf", "a.PDF", "b", "b-2", "a-3.pdf")), (names) => {
        const registry = new NameRegistry();
        const claimed = names.map((name) => registry.claim(name));
        expect(new Set(claimed).size).toBe(names.length);
        expect(registry.size).toBe(names.length);
      })
    );
  });

  it("message keys are eight stable hex digits", () => {
    fc.assert(
      fc.property(fc.string(), (messageId) => {
        const key = messageKeyFor(messageId);
        expect(key).toMatch(/^[0-9a-f]{8}$/);
        expect(messageKeyFor(messageId)).toBe(key);
      })
    );
  });

  it("timestamps are the UTC digits of the ISO form", () => {
    fc.assert(
      fc.property(arbDate, (date) => {
        const stamp = formatTimestamp(date);
        expect(stamp).toMatch(/^\d{14}$/);
        expect(stamp.slice(0, 4)).toBe(String(date.getUTCFullYear()));
      })
    );
  });
});

// =============================================================================
// 3. BACKOFF
// =============================================================================

describe("Backoff", () => {
  it("schedules grow monotonically and respect the cap", () => {
    fc.assert(
      fc.property(fc.nat({ max: 12 }), arbBackoffPolicy, (retries, policy) => {
        const schedule = backoffSchedule(retries, policy);
        expect(schedule).toHaveLength(retries);
        schedule.forEach((delay, i) => {
          expect(delay).toBeLessThanOrEqual(policy.maxDelayMs);
          if (i > 0) expect(delay).toBeGreaterThanOrEqual(schedule[i - 1] ?? 0);
        });
      })
    );
  });

  it("the first retry waits the base delay, capped", () => {
    fc.assert(
      fc.property(arbBackoffPolicy, (policy) => {
        expect(backoffDelay(0, policy)).toBe(Math.min(policy.baseDelayMs, policy.maxDelayMs));
        expect(backoffDelay(-1, policy)).toBe(0);
      })
    );
  });
});

// =============================================================================
// 4. PERSISTED STATE
// =============================================================================

describe("Persisted records", () => {
  it("circuit state survives JSON storage", () => {
    fc.assert(
      fc.property(arbCircuitState, (state) => {
        expect(parseCircuitState(JSON.parse(JSON.stringify(state)))).toEqual(state);
      })
    );
  });

  it("circuit state with a negative failure count is rejected", () => {
    fc.assert(
      fc.property(arbCircuitState, fc.integer({ min: -100, max: -1 }), (state, failureCount) => {
        expect(() => parseCircuitState({ ...state, failureCount })).toThrow();
      })
    );
  });

  it("ledger records survive JSON storage", () => {
    fc.assert(
      fc.property(arbMessageRecord, (record) => {
        const parsed = parseMessageRecord(JSON.parse(JSON.stringify(record)));
        expect(parsed).toEqual(record);
        expect(parsed.failedAttachments).toBeLessThanOrEqual(parsed.attachmentCount);
      })
    );
  });
});

// =============================================================================
// 5. REPORTS (Most Obvious)
// =============================================================================

describe("Report summaries", () => {
  it("counts every outcome under exactly one status", () => {
    fc.assert(
      fc.property(arbOutcomes, (outcomes) => {
        const summary = summarize(outcomes);
        const sum = ATTACHMENT_STATUSES.reduce((acc, status) => acc + summary[status], 0);
        expect(summary.total).toBe(outcomes.length);
        expect(sum).toBe(outcomes.length);
        for (const status of ATTACHMENT_STATUSES) {
          expect(summary[status]).toBe(outcomes.filter((o) => o.status === status).length);
        }
      })
    );
  });

  it("status follows the counts", () => {
    fc.assert(
      fc.property(arbOutcomes, fc.boolean(), (outcomes, cancelled) => {
        const summary = summarize(outcomes);
        const status = reportStatus(summary, cancelled);

        if (!cancelled) expect(status).not.toBe("cancelled");
        if (cancelled && summary.cancelled > 0) expect(status).toBe("cancelled");
        if (status === "failed") {
          expect(summary.failed).toBeGreaterThan(0);
          expect(summary.converted + summary.partial).toBe(0);
        }
        if (status === "success") {
          expect(summary.failed + summary.partial).toBe(0);
        }
      })
    );
  });

  it("anything thrown summarizes with its message", () => {
    fc.assert(
      fc.property(fc.string(), (message) => {
        expect(summarizeError(new Error(message))).toEqual({
          kind: "processing",
          name: "ProcessingError",
          message,
        });
      })
    );
  });
});
