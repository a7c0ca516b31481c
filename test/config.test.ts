import { describe, expect, it } from "vitest";
import { buildLaunchOptions, defaultRoots, loadConfig } from "../src/config.js";
import { ConfigError } from "../src/errors.js";

const CWD = "/work";

describe("loadConfig", () => {
  it("applies defaults", () => {
    const config = loadConfig({ ARXIV_SERVER_PATH: "server-dir" }, CWD);

    expect(config).toEqual({
      model: {
        region: "us-west-2",
        modelId: "anthropic.claude-3-haiku-20240307-v1:0",
        timeoutMs: 60000,
        maxTokens: 512,
        temperature: 0.1,
      },
      server: {
        path: "/work/server-dir",
        command: "python",
        script: "server.py",
        downloadPath: "/work/downloads",
        sslVerify: false,
      },
      elicitationPolicy: "queue",
      logLevel: "warn",
      handshakeTimeoutMs: 30000,
      requestTimeoutMs: 300000,
    });
  });

  it("reads overrides", () => {
    const config = loadConfig(
      {
        ARXIV_SERVER_PATH: "/srv/articles",
        ARXIV_SERVER_COMMAND: "python3",
        DOWNLOAD_PATH: "papers",
        SSL_VERIFY: "YES",
        ELICITATION_POLICY: "reject",
        LOG_LEVEL: "debug",
        AWS_REGION: "eu-central-1",
        MCP_REQUEST_TIMEOUT_MS: "1500",
        MODEL_TEMPERATURE: "0",
      },
      CWD
    );

    expect(config.server.path).toBe("/srv/articles");
    expect(config.server.command).toBe("python3");
    expect(config.server.downloadPath).toBe("/work/papers");
    expect(config.server.sslVerify).toBe(true);
    expect(config.elicitationPolicy).toBe("reject");
    expect(config.logLevel).toBe("debug");
    expect(config.model.region).toBe("eu-central-1");
    expect(config.model.temperature).toBe(0);
    expect(config.requestTimeoutMs).toBe(1500);
  });

  it("treats empty values as unset", () => {
    const config = loadConfig({ ARXIV_SERVER_PATH: "server-dir", LOG_LEVEL: "", AWS_REGION: "  " }, CWD);
    expect(config.logLevel).toBe("warn");
    expect(config.model.region).toBe("us-west-2");
  });

  it("requires the server path", () => {
    const err: unknown = (() => {
      try {
        return loadConfig({ ARXIV_SERVER_PATH: "" }, CWD);
      } catch (e) {
        return e;
      }
    })();

    expect(err).toBeInstanceOf(ConfigError);
    expect(err).toMatchObject({
      message: "Invalid configuration: ARXIV_SERVER_PATH: is required",
      issues: ["ARXIV_SERVER_PATH: is required"],
    });
  });

  it("lists every invalid variable", () => {
    try {
      loadConfig(
        { ARXIV_SERVER_PATH: "x", ELICITATION_POLICY: "drop", MCP_HANDSHAKE_TIMEOUT_MS: "-5", SSL_VERIFY: "maybe" },
        CWD
      );
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigError);
      if (!(err instanceof ConfigError)) return;
      expect(err.issues.map((issue) => issue.split(":")[0])).toEqual([
        "SSL_VERIFY",
        "ELICITATION_POLICY",
        "MCP_HANDSHAKE_TIMEOUT_MS",
      ]);
    }
  });
});

describe("buildLaunchOptions", () => {
  it("starts the server script with its environment and roots", () => {
    const config = loadConfig({ ARXIV_SERVER_PATH: "server-dir" }, CWD);

    expect(buildLaunchOptions(config, CWD)).toEqual({
      command: "python",
      args: ["/work/server-dir/server.py"],
      env: {
        DOWNLOAD_PATH: "/work/downloads",
        PYTHONPATH: "/work/server-dir",
        SSL_VERIFY: "false",
      },
      roots: [
        { uri: "file:///work", name: "Current Project Directory" },
        { uri: "file:///work/downloads", name: "Downloads Directory" },
      ],
      requiredPaths: ["/work/server-dir/server.py"],
      handshakeTimeoutMs: 30000,
      requestTimeoutMs: 300000,
      elicitationPolicy: "queue",
    });
  });

  it("derives roots from the working and download directories", () => {
    const config = loadConfig({ ARXIV_SERVER_PATH: "s", DOWNLOAD_PATH: "/data/my papers" }, CWD);
    expect(defaultRoots(config, CWD)).toEqual([
      { uri: "file:///work", name: "Current Project Directory" },
      { uri: "file:///data/my%20papers", name: "Downloads Directory" },
    ]);
  });
});
