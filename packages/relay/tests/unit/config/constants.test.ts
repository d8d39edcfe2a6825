/**
 * @file constants.test.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import { describe, it, expect } from "vitest";
import {
  CLOSE_CODES,
  CONNECTION_TIMING,
  EXECUTION_CONFIG,
  SESSION_ID_CONFIG,
} from "../../../src/config/constants.js";

describe("CLOSE_CODES", () => {
  it("should use the registered WebSocket close codes", () => {
    expect(CLOSE_CODES.GOING_AWAY).toBe(1001);
    expect(CLOSE_CODES.POLICY_VIOLATION).toBe(1008);
    expect(CLOSE_CODES.INTERNAL_ERROR).toBe(1011);
    expect(CLOSE_CODES.QUEUE_OVERFLOW).toBe(1013);
  });
});

describe("CONNECTION_TIMING", () => {
  it("should leave the WebSocket grace period inside the shutdown limit", () => {
    expect(CONNECTION_TIMING.SHUTDOWN_GRACE_MS).toBeLessThan(CONNECTION_TIMING.SHUTDOWN_TIMEOUT_MS);
  });
});

describe("SESSION_ID_CONFIG", () => {
  it("should produce 32-bit lowercase hex ids", () => {
    expect(SESSION_ID_CONFIG.ALPHABET).toBe("0123456789abcdef");
    expect(SESSION_ID_CONFIG.LENGTH * 4).toBe(32);
  });
});

describe("EXECUTION_CONFIG", () => {
  it("should default to go", () => {
    expect(EXECUTION_CONFIG.DEFAULT_LANGUAGE).toBe("go");
    expect(EXECUTION_CONFIG.LANGUAGES).toContain(EXECUTION_CONFIG.DEFAULT_LANGUAGE);
  });
});
