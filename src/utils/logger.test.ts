import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { Logger, resolveLogDir } from "./logger";

describe("resolveLogDir", () => {
  it("is null when file logging is switched off", () => {
    expect(resolveLogDir({ LOG_TO_FILE: "false", NODE_ENV: "production" })).toBeNull();
  });

  it("is null under the test environment", () => {
    expect(resolveLogDir({ NODE_ENV: "test", LOG_DIR: "/var/log/eth" })).toBeNull();
  });

  it("uses LOG_DIR when set", () => {
    expect(resolveLogDir({ NODE_ENV: "production", LOG_DIR: "/var/log/eth" })).toBe("/var/log/eth");
  });

  it("defaults to logs/ under the working directory", () => {
    expect(resolveLogDir({ NODE_ENV: "production" })).toBe(path.join(process.cwd(), "logs"));
  });
});

describe("Logger", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "eth-logger-"));
    jest.spyOn(process.stderr, "write").mockReturnValue(true);
  });

  afterEach(() => {
    jest.restoreAllMocks();
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("creates no log directory until one is set", () => {
    const logDir = path.join(dir, "logs");
    const log = new Logger({ logDir: null });
    log.info("hello");

    expect(fs.existsSync(logDir)).toBe(false);

    log.setLogDir(logDir);
    log.info("hello again");

    const files = fs.readdirSync(logDir);
    expect(files).toHaveLength(1);
    expect(files[0]).toMatch(/^log_\d{4}-\d{2}-\d{2}_\d{2}-\d{2}-\d{2}\.log$/);
    const content = fs.readFileSync(path.join(logDir, files[0]), "utf-8");
    expect(content).toContain("[INFO] hello again");
    expect(content).not.toContain("[INFO] hello\n");
  });

  it("stops writing to the file when the directory is cleared", () => {
    const log = new Logger({ logDir: dir });
    log.setLogDir(null);
    log.warn("not in a file");

    expect(fs.readdirSync(dir)).toEqual([]);
  });

  it("filters messages below the level", () => {
    const log = new Logger({ level: "warn", logDir: null });
    log.info("quiet");
    log.warn("loud");

    expect(process.stderr.write).toHaveBeenCalledTimes(1);
    expect(process.stderr.write).toHaveBeenCalledWith(expect.stringContaining("[WARN] loud"));
  });
});
