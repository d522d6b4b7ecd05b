/**
 * Tests for PlatformInfo, its factory and the mock factory.
 */

import { homedir } from "node:os";
import { describe, it, expect } from "vitest";
import { createMockPlatformInfo } from "./platform-info.test-utils";
import { createPlatformInfo, requiresExecutableBit } from "./platform-info";

describe("createMockPlatformInfo", () => {
  it("returns sensible defaults", () => {
    const platformInfo = createMockPlatformInfo();

    expect(platformInfo.platform).toBe("linux");
    expect(platformInfo.arch).toBe("x64");
    expect(platformInfo.homeDir).toBe("/home/test");
  });

  it("accepts overrides while keeping other defaults", () => {
    const platformInfo = createMockPlatformInfo({ platform: "darwin", arch: "arm64" });

    expect(platformInfo.platform).toBe("darwin");
    expect(platformInfo.arch).toBe("arm64");
    expect(platformInfo.homeDir).toBe("/home/test"); // default still applies
  });
});

describe("createPlatformInfo", () => {
  it("reads the running process", () => {
    const platformInfo = createPlatformInfo();

    expect(platformInfo).toEqual({
      platform: process.platform,
      arch: process.arch,
      homeDir: homedir(),
    });
  });
});

describe("requiresExecutableBit", () => {
  it.each([
    ["linux", true],
    ["darwin", true],
    ["freebsd", true],
    ["win32", false],
  ] as const)("returns %s -> %s", (platform, expected) => {
    expect(requiresExecutableBit(createMockPlatformInfo({ platform }))).toBe(expected);
  });
});
