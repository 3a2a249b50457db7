import { afterEach, describe, expect, it, vi } from "vitest";

const spinner = vi.hoisted(() => ({
  text: "",
  isSpinning: false,
  start: vi.fn(),
  succeed: vi.fn(),
  fail: vi.fn(),
}));

vi.mock("ora", () => ({
  default: vi.fn(() => spinner),
}));

import { initContext, resetContext } from "./cli-context.js";
import {
  createProgress,
  describeProgress,
  formatBytes,
  logProgress,
  SilentProgress,
  SpinnerProgress,
} from "./progress.js";

describe("formatBytes", () => {
  it("keeps small counts in bytes", () => {
    expect(formatBytes(0)).toBe("0 B");
    expect(formatBytes(1023)).toBe("1023 B");
  });

  it("scales to one decimal", () => {
    expect(formatBytes(1536)).toBe("1.5 KB");
    expect(formatBytes(1024 * 1024)).toBe("1.0 MB");
    expect(formatBytes(3 * 1024 ** 3)).toBe("3.0 GB");
  });
});

describe("describeProgress", () => {
  it("shows a bare counter when the size is unknown", () => {
    expect(describeProgress("a.bin", 2048, 0)).toBe("Downloading a.bin 2.0 KB");
  });

  it("shows the total and a floored percentage", () => {
    expect(describeProgress("a.bin", 999, 1000)).toBe("Downloading a.bin 999 B / 1000 B (99%)");
  });

  it("caps the percentage at 100", () => {
    expect(describeProgress("a.bin", 1200, 1000)).toBe("Downloading a.bin 1.2 KB / 1000 B (100%)");
  });
});

describe("SpinnerProgress", () => {
  afterEach(() => {
    spinner.text = "";
    spinner.isSpinning = false;
    spinner.start.mockClear();
    spinner.succeed.mockClear();
    spinner.fail.mockClear();
  });

  it("counts resumed bytes toward the total", () => {
    const progress = new SpinnerProgress();

    progress.start("a.bin", 100, 40);
    progress.advance(10);

    expect(spinner.start).toHaveBeenCalledWith("Downloading a.bin 40 B / 100 B (40%)");
    expect(spinner.text).toBe("Downloading a.bin 50 B / 100 B (50%)");
  });

  it("reports the final size on finish", () => {
    const progress = new SpinnerProgress();

    progress.start("a.bin", 0, 0);
    progress.advance(2048);
    progress.finish("a.bin");

    expect(spinner.succeed).toHaveBeenCalledWith("Downloaded a.bin (2.0 KB)");
  });

  it("only fails a running spinner", () => {
    const progress = new SpinnerProgress();

    progress.fail("before start");
    spinner.isSpinning = true;
    progress.fail("The transfer was interrupted");

    expect(spinner.fail).toHaveBeenCalledTimes(1);
    expect(spinner.fail).toHaveBeenCalledWith("The transfer was interrupted");
  });
});

describe("createProgress", () => {
  afterEach(() => {
    resetContext();
  });

  it("is silent in quiet mode", () => {
    initContext(["node", "armory-dl", "--quiet"], {});
    expect(createProgress()).toBeInstanceOf(SilentProgress);
  });

  it("is silent in JSON mode", () => {
    initContext(["node", "armory-dl", "--json"], {});
    expect(createProgress()).toBeInstanceOf(SilentProgress);
  });

  it("uses a spinner otherwise", () => {
    initContext(["node", "armory-dl"], {});
    expect(createProgress()).toBeInstanceOf(SpinnerProgress);
  });
});

describe("logProgress", () => {
  afterEach(() => {
    resetContext();
  });

  it("writes notices to stderr", () => {
    const consoleErrorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
    initContext(["node", "armory-dl"], {});

    logProgress("Credentials saved");

    expect(consoleErrorSpy).toHaveBeenCalledWith("Credentials saved");
  });

  it("stays quiet in JSON mode", () => {
    const consoleErrorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
    initContext(["node", "armory-dl", "--json"], {});

    logProgress("Credentials saved");

    expect(consoleErrorSpy).not.toHaveBeenCalled();
  });
});
