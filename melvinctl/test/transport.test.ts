import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { SshTransport } from "../src/transport/ssh-transport.js";
import { ContainerTransport, PRIVSEP_DIR } from "../src/transport/container-transport.js";
import { EnvCredentialsProvider } from "../src/transport/credentials.js";
import { createTransport } from "../src/transport/index.js";
import { TransferFailure } from "../src/core/errors.js";
import { ExecTimeoutError } from "../src/exec/executor.js";
import { resetLogging } from "../src/log/logger.js";
import type { TargetConfig, TransportConfig } from "../src/types/config.js";
import { FakeHost, RecordingExecutor, fail, ok } from "./fakes.js";

const target: TargetConfig = {
  kind: "bare",
  host: "10.0.0.5",
  port: 2222,
  user: "root",
  session_name: "melvin_evaluation"
};

const transportConfig: TransportConfig = { timeout_ms: 5000 };

const KEY_OPTS = [
  "-o",
  "StrictHostKeyChecking=accept-new",
  "-o",
  "ConnectTimeout=10",
  "-o",
  "BatchMode=yes",
  "-o",
  "IdentitiesOnly=yes",
  "-i",
  "/keys/id_test"
];

describe("SshTransport", () => {
  let tmp: string;

  beforeEach(() => {
    tmp = fs.mkdtempSync(path.join(os.tmpdir(), "melvinctl-transport-"));
  });

  afterEach(() => {
    fs.rmSync(tmp, { recursive: true, force: true });
    resetLogging();
  });

  it("runs remote commands as one quoted word after --", async () => {
    const local = new RecordingExecutor();
    const ssh = new SshTransport(target, { kind: "key", identityFile: "/keys/id_test" }, local, transportConfig);

    await ssh.exec(["tmux", "has-session", "-t", "=melvin_evaluation"]);
    await ssh.exec(["sh", "-c", "command -v tmux"]);

    expect(local.calls[0]).toEqual({
      command: "ssh",
      args: [...KEY_OPTS, "-p", "2222", "root@10.0.0.5", "--", "tmux has-session -t =melvin_evaluation"],
      opts: { env: undefined, timeoutMs: 5000 }
    });
    expect(local.calls[1]?.args.at(-1)).toBe("sh -c 'command -v tmux'");
  });

  it("feeds passwords through SSHPASS, never argv", async () => {
    const local = new RecordingExecutor();
    const ssh = new SshTransport(target, { kind: "password", secret: "test-secret" }, local, transportConfig);

    await ssh.exec(["true"]);

    const call = local.calls[0];
    expect(call?.command).toBe("sshpass");
    expect(call?.args.slice(0, 2)).toEqual(["-e", "ssh"]);
    expect(call?.args).not.toContain("test-secret");
    expect(call?.opts.env).toEqual({ SSHPASS: "test-secret" });
  });

  it("uses only batch mode with the agent", async () => {
    const local = new RecordingExecutor();
    const ssh = new SshTransport(target, { kind: "agent" }, local, { timeout_ms: 5000, strict_host_key_checking: "yes" });

    await ssh.exec(["true"]);

    expect(local.calls[0]?.args.slice(0, 6)).toEqual([
      "-o",
      "StrictHostKeyChecking=yes",
      "-o",
      "ConnectTimeout=10",
      "-o",
      "BatchMode=yes"
    ]);
  });

  it("turns ssh's own exit code into a transfer failure", async () => {
    const local = new RecordingExecutor(() => fail(255, "Connection refused"));
    const ssh = new SshTransport(target, { kind: "agent" }, local, transportConfig);

    await expect(ssh.exec(["true"])).rejects.toBeInstanceOf(TransferFailure);
  });

  it("returns the remote command's non-zero exit", async () => {
    const local = new RecordingExecutor(() => fail(1, "can't find session"));
    const ssh = new SshTransport(target, { kind: "agent" }, local, transportConfig);

    expect((await ssh.exec(["tmux", "has-session", "-t", "=x"])).code).toBe(1);
  });

  it("copies to a staged name, then chmods and renames it into place", async () => {
    const binary = path.join(tmp, "melvin-ob");
    fs.writeFileSync(binary, "binary-v1");
    const local = new RecordingExecutor();
    const ssh = new SshTransport(target, { kind: "key", identityFile: "/keys/id_test" }, local, transportConfig);

    await ssh.copyArtifact(binary, "/home/melvin-ob");

    expect(local.calls.map((c) => c.command)).toEqual(["ssh", "scp", "ssh", "ssh"]);
    expect(local.calls[0]?.args.at(-1)).toBe("mkdir -p /home");

    const scpArgs = local.calls[1]?.args ?? [];
    expect(scpArgs.slice(0, KEY_OPTS.length + 3)).toEqual([...KEY_OPTS, "-P", "2222", binary]);
    const dest = scpArgs.at(-1) ?? "";
    expect(dest).toMatch(/^root@10\.0\.0\.5:\/home\/melvin-ob\.part-\d+-[0-9a-f]{8}$/);
    const staged = dest.slice("root@10.0.0.5:".length);

    expect(local.calls[2]?.args.at(-1)).toBe(`chmod 755 ${staged}`);
    expect(local.calls[3]?.args.at(-1)).toBe(`mv -f -- ${staged} /home/melvin-ob`);
  });

  it("copies configs with mode 644", async () => {
    const conf = path.join(tmp, "tmux.conf");
    fs.writeFileSync(conf, "set -g mouse on\n");
    const local = new RecordingExecutor();
    const ssh = new SshTransport(target, { kind: "agent" }, local, transportConfig);

    await ssh.copyConfig(conf, "/home/tmux.conf");

    expect(local.calls[2]?.args.at(-1)).toMatch(/^chmod 644 \/home\/tmux\.conf\.part-/);
  });

  it("removes the staged file when scp fails", async () => {
    const binary = path.join(tmp, "melvin-ob");
    fs.writeFileSync(binary, "binary-v1");
    const local = new RecordingExecutor((command) => (command === "scp" ? fail(1, "disk full") : ok()));
    const ssh = new SshTransport(target, { kind: "agent" }, local, transportConfig);

    await expect(ssh.copyArtifact(binary, "/home/melvin-ob")).rejects.toThrow("Copying");

    expect(local.calls.map((c) => c.command)).toEqual(["ssh", "scp", "ssh"]);
    expect(local.calls[2]?.args.at(-1)).toMatch(/^rm -f -- \/home\/melvin-ob\.part-/);
  });

  it("removes the staged file when scp times out", async () => {
    const binary = path.join(tmp, "melvin-ob");
    fs.writeFileSync(binary, "binary-v1");
    const local = new RecordingExecutor((command) => {
      if (command === "scp") throw new ExecTimeoutError("scp", 5000);
      return ok();
    });
    const ssh = new SshTransport(target, { kind: "agent" }, local, transportConfig);

    await expect(ssh.copyArtifact(binary, "/home/melvin-ob")).rejects.toThrow(
      "copy melvin-ob on root@10.0.0.5:2222: scp timed out after 5000ms"
    );

    expect(local.calls.map((c) => c.command)).toEqual(["ssh", "scp", "ssh"]);
    expect(local.calls[2]?.args.at(-1)).toMatch(/^rm -f -- \/home\/melvin-ob\.part-/);
  });

  it("removes the staged file when finalizing times out", async () => {
    const binary = path.join(tmp, "melvin-ob");
    fs.writeFileSync(binary, "binary-v1");
    const local = new RecordingExecutor((command, args) => {
      if (command === "ssh" && String(args.at(-1)).startsWith("chmod")) throw new ExecTimeoutError("ssh", 5000);
      return ok();
    });
    const ssh = new SshTransport(target, { kind: "agent" }, local, transportConfig);

    await expect(ssh.copyArtifact(binary, "/home/melvin-ob")).rejects.toBeInstanceOf(TransferFailure);

    expect(local.calls.map((c) => c.command)).toEqual(["ssh", "scp", "ssh", "ssh"]);
    expect(local.calls[3]?.args.at(-1)).toMatch(/^rm -f -- \/home\/melvin-ob\.part-/);
  });

  it("refuses to copy a missing local file without touching the host", async () => {
    const local = new RecordingExecutor();
    const ssh = new SshTransport(target, { kind: "agent" }, local, transportConfig);

    await expect(ssh.copyArtifact(path.join(tmp, "nope"), "/home/melvin-ob")).rejects.toBeInstanceOf(TransferFailure);
    expect(local.calls).toEqual([]);
  });

  it("pulls into a staged path and renames it over the destination", async () => {
    const local = new RecordingExecutor((command, args) => {
      if (command === "scp") fs.writeFileSync(args[args.length - 1] ?? "", "snapshot");
      return ok();
    });
    const ssh = new SshTransport(target, { kind: "agent" }, local, transportConfig);
    const dest = path.join(tmp, "out", "orbit.bin");

    await ssh.pull("/home/orbit.bin", dest);

    expect(fs.readFileSync(dest, "utf8")).toBe("snapshot");
    expect(fs.readdirSync(path.join(tmp, "out"))).toEqual(["orbit.bin"]);
    expect(local.calls[0]?.args).toContain("root@10.0.0.5:/home/orbit.bin");
    expect(local.calls[0]?.args).not.toContain("-r");
  });

  it("pulls directories recursively and leaves nothing behind on failure", async () => {
    const local = new RecordingExecutor(() => fail(1, "No such file or directory"));
    const ssh = new SshTransport(target, { kind: "agent" }, local, transportConfig);

    await expect(ssh.pull("/home/dumps", path.join(tmp, "dumps"), { recursive: true })).rejects.toThrow(
      "Pulling /home/dumps failed (exit 1)"
    );
    expect(local.calls[0]?.args).toContain("-r");
    expect(fs.readdirSync(tmp)).toEqual([]);
  });
});

describe("ContainerTransport", () => {
  const containerTarget: TargetConfig = {
    ...target,
    kind: "container",
    host: "127.0.0.1",
    port: 22,
    sshd_path: "/usr/sbin/sshd"
  };

  it("leaves a running sshd alone", async () => {
    const local = new RecordingExecutor();
    const inner = new FakeHost();
    const container = new ContainerTransport(containerTarget, inner, local);

    expect(await container.ensureSshd()).toBe("already-running");
    expect(local.calls.map((c) => [c.command, ...c.args])).toEqual([["pgrep", "-x", "sshd"]]);
  });

  it("creates the privilege separation directory and starts sshd", async () => {
    const local = new RecordingExecutor((command) => (command === "pgrep" ? fail(1, "") : ok()));
    const inner = new FakeHost();
    const container = new ContainerTransport(containerTarget, inner, local);

    await container.prepare();

    expect(local.calls.map((c) => [c.command, ...c.args])).toEqual([
      ["pgrep", "-x", "sshd"],
      ["mkdir", "-p", PRIVSEP_DIR],
      ["/usr/sbin/sshd"]
    ]);
    expect(inner.prepared).toBe(1);
  });

  it("fails when sshd will not start", async () => {
    const local = new RecordingExecutor((command) => {
      if (command === "pgrep") return fail(1, "");
      return command === "/usr/sbin/sshd" ? fail(255, "bind failed") : ok();
    });
    const container = new ContainerTransport(containerTarget, new FakeHost(), local);

    await expect(container.ensureSshd()).rejects.toThrow("/usr/sbin/sshd exited with 255");
  });

  it("requires sshd_path", () => {
    const { sshd_path: _omit, ...withoutSshd } = containerTarget;
    expect(() => new ContainerTransport(withoutSshd, new FakeHost(), new RecordingExecutor())).toThrow(
      "container target requires sshd_path"
    );
  });

  it("is chosen by createTransport for container targets", () => {
    const t = createTransport(containerTarget, { kind: "agent" }, new RecordingExecutor(), transportConfig);
    expect(t.kind).toBe("container");
    expect(t.endpoint).toEqual({ host: "127.0.0.1", port: 22, user: "root" });
    expect(createTransport(target, { kind: "agent" }, new RecordingExecutor(), transportConfig).kind).toBe("bare");
  });
});

describe("EnvCredentialsProvider", () => {
  afterEach(() => resetLogging());

  it("prefers an explicit identity file", async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "melvinctl-creds-"));
    const key = path.join(dir, "id_test");
    fs.writeFileSync(key, "placeholder");
    const creds = new EnvCredentialsProvider({ identityFile: key, env: { MELVINCTL_SSH_PASSWORD: "test-secret" } });

    expect(await creds.resolve(target)).toEqual({ kind: "key", identityFile: key });
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("rejects a missing identity file", async () => {
    const creds = new EnvCredentialsProvider({ env: {} });
    await expect(creds.resolve({ ...target, identity_file: "/nonexistent/id" })).rejects.toThrow(
      "Identity file not found: /nonexistent/id"
    );
  });

  it("reads the password from the default variable", async () => {
    const creds = new EnvCredentialsProvider({ env: { MELVINCTL_SSH_PASSWORD: "test-secret" } });
    expect(await creds.resolve(target)).toEqual({ kind: "password", secret: "test-secret" });
  });

  it("fails when a named password variable is unset", async () => {
    const creds = new EnvCredentialsProvider({ passwordEnv: "EVAL_PW", env: {} });
    await expect(creds.resolve(target)).rejects.toThrow("Password variable EVAL_PW is not set");
  });

  it("falls back to the agent", async () => {
    expect(await new EnvCredentialsProvider({ env: {} }).resolve(target)).toEqual({ kind: "agent" });
  });
});
