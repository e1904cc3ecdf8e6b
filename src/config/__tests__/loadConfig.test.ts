import assert from "node:assert/strict";
import { test, type TestContext } from "node:test";
import path from "node:path";
import { tmpdir } from "node:os";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { DEFAULT_EXCLUDES } from "../defaults.js";
import { loadConfig } from "../loadConfig.js";
import { ConfigInvalidOutputFormatError } from "../../errors/config.errors.js";

const ENV_KEYS = [
  "DEFKIT_DEFECT_URL_BASE",
  "DEFKIT_CHECKER_URL_BASE",
  "DEFKIT_OUTPUT_FORMAT",
  "DEFKIT_SILENT",
  "DEFKIT_IGNORE_PATH"
];

const applyEnv = (t: TestContext, env: Record<string, string>) => {
  const snapshot = new Map(ENV_KEYS.map((key) => [key, process.env[key]]));

  for (const key of ENV_KEYS) {
    const value = env[key];
    if (value === undefined) {
      delete process.env[key];
    } else {
      process.env[key] = value;
    }
  }

  t.after(() => {
    for (const key of ENV_KEYS) {
      const value = snapshot.get(key);
      if (value === undefined) {
        delete process.env[key];
      } else {
        process.env[key] = value;
      }
    }
  });
};

async function projectDir(t: TestContext, files: Record<string, unknown> = {}): Promise<string> {
  const dir = await mkdtemp(path.join(tmpdir(), "defkit-config-"));
  t.after(() => rm(dir, { recursive: true, force: true }));
  for (const [name, content] of Object.entries(files)) {
    await writeFile(path.join(dir, name), JSON.stringify(content));
  }
  return dir;
}

test("falls back to defaults without a config file", async (t) => {
  applyEnv(t, {});
  const cwd = await projectDir(t);

  const cfg = await loadConfig({ cwd });

  assert.deepEqual(cfg, {
    cwd,
    defectUrlBase: "",
    checkerUrlBase: "",
    output: { format: "text" },
    input: { silent: false, ignorePath: false, exclude: DEFAULT_EXCLUDES }
  });
});

test("environment wins over the config file", async (t) => {
  applyEnv(t, { DEFKIT_DEFECT_URL_BASE: "https://env.test/cid=", DEFKIT_SILENT: "off" });
  const cwd = await projectDir(t, {
    "defkit.config.json": {
      defectUrlBase: "https://file.test/cid=",
      checkerUrlBase: "https://file.test/doc/",
      output: { format: "json" },
      input: { silent: true, exclude: ["**/vendor/**"] }
    }
  });

  const cfg = await loadConfig({ cwd });

  assert.equal(cfg.defectUrlBase, "https://env.test/cid=");
  assert.equal(cfg.checkerUrlBase, "https://file.test/doc/");
  assert.equal(cfg.output.format, "json");
  assert.equal(cfg.input.silent, false);
  assert.deepEqual(cfg.input.exclude, ["**/vendor/**"]);
});

test("reads the rc file and an explicit path", async (t) => {
  applyEnv(t, { DEFKIT_IGNORE_PATH: "yes" });
  const cwd = await projectDir(t, {
    ".defkitrc.json": { checkerUrlBase: "https://rc.test/" },
    "custom.json": { checkerUrlBase: "https://custom.test/" }
  });

  const rc = await loadConfig({ cwd });
  assert.equal(rc.checkerUrlBase, "https://rc.test/");
  assert.equal(rc.input.ignorePath, true);

  const custom = await loadConfig({ cwd, configPath: "custom.json" });
  assert.equal(custom.checkerUrlBase, "https://custom.test/");
});

test("rejects an unknown output format", async (t) => {
  applyEnv(t, { DEFKIT_OUTPUT_FORMAT: "xml" });
  const cwd = await projectDir(t);

  await assert.rejects(loadConfig({ cwd }), ConfigInvalidOutputFormatError);
});
