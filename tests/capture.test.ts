import { makeSettings } from "../src/config/settings.js";
import { CAPTURE_ENV, getOutput, mergeOutput } from "../src/output/capture.js";
import type { SpawnRequest, SpawnResult, Spawner } from "../src/output/capture.js";

function recording(result: SpawnResult): { spawner: Spawner; requests: SpawnRequest[] } {
  const requests: SpawnRequest[] = [];
  return {
    requests,
    spawner: (request) => {
      requests.push(request);
      return result;
    },
  };
}

describe("mergeOutput", () => {
  it("puts stderr before stdout", () => {
    expect(mergeOutput("err", "out")).toBe("err\nout");
    expect(mergeOutput("err\n", "out")).toBe("err\nout");
  });

  it("returns the other stream when one is empty", () => {
    expect(mergeOutput("", "out")).toBe("out");
    expect(mergeOutput("err", "")).toBe("err");
    expect(mergeOutput("", "")).toBe("");
  });
});

describe("getOutput", () => {
  it("re-runs the script through the shell and merges the streams", () => {
    const { spawner, requests } = recording({ stdout: "usage\n", stderr: "git: 'stauts' is not a git command.\n" });
    const output = getOutput("git stauts", makeSettings(), spawner);

    expect(output).toBe("git: 'stauts' is not a git command.\nusage\n");
    expect(requests).toHaveLength(1);
    expect(requests[0]?.args.at(-1)).toBe("git stauts");
    expect(requests[0]?.timeoutMs).toBe(3000);
  });

  it("waits longer for slow commands", () => {
    const { spawner, requests } = recording({ stdout: "", stderr: "" });
    getOutput("gradle build", makeSettings(), spawner);
    getOutput("git status", makeSettings({ waitCommand: 1 }), spawner);
    expect(requests.map((r) => r.timeoutMs)).toEqual([15000, 1000]);
  });

  it("forces the C locale and git alias tracing, with configured env on top", () => {
    const { spawner, requests } = recording({ stdout: "", stderr: "" });
    getOutput("ls", makeSettings({ env: { LANG: "en_US.UTF-8", EXTRA: "1" } }), spawner);
    const env = requests[0]?.env ?? {};
    expect(env.LC_ALL).toBe(CAPTURE_ENV.LC_ALL);
    expect(env.GIT_TRACE).toBe("1");
    expect(env.LANG).toBe("en_US.UTF-8");
    expect(env.EXTRA).toBe("1");
  });

  it("returns what was written before a timeout", () => {
    const { spawner } = recording({ stdout: "partial", stderr: "", error: new Error("spawnSync /bin/sh ETIMEDOUT") });
    expect(getOutput("vagrant up", makeSettings(), spawner)).toBe("partial");
  });
});
