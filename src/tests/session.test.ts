import fsp from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { ConnectionError } from "../errors.js";
import type { HostRecord } from "../host-registry.js";
import {
  SshSession,
  connectSession,
  isSocketFailure,
  withSession,
  type ChannelOutput,
  type DialConfig,
  type Dialer,
  type RemoteSession,
  type SshConnection,
} from "../session.js";

const host: HostRecord = ["box", "alice", "10.0.0.5", 22];

class FakeConnection implements SshConnection {
  ended = 0;
  pending: ((output: ChannelOutput) => void)[] = [];

  exec(): Promise<ChannelOutput> {
    return new Promise((resolve) => this.pending.push(resolve));
  }

  end(): void {
    this.ended += 1;
  }
}

function socketError(code: string): Error {
  return Object.assign(new Error(`connect ${code} 10.0.0.5:22`), {
    code,
    level: "client-socket",
  });
}

function authError(): Error {
  return Object.assign(new Error("All configured authentication methods failed"), {
    level: "client-authentication",
  });
}

function scriptedDialer(outcomes: (SshConnection | Error)[]) {
  const configs: DialConfig[] = [];
  const dialer: Dialer = async (config) => {
    configs.push(config);
    const next = outcomes.shift();
    if (!next) throw new Error("unexpected dial");
    if (next instanceof Error) throw next;
    return next;
  };
  return { configs, dialer };
}

describe("isSocketFailure", () => {
  it("separates network failures from authentication failures", () => {
    expect(isSocketFailure(socketError("ECONNREFUSED"))).toBe(true);
    expect(isSocketFailure(Object.assign(new Error("x"), { code: "ENOTFOUND" }))).toBe(true);
    expect(isSocketFailure(authError())).toBe(false);
    expect(isSocketFailure("ECONNREFUSED")).toBe(false);
  });
});

describe("connectSession", () => {
  let tmp: string;
  let keyFile: string;

  beforeEach(async () => {
    tmp = await fsp.mkdtemp(path.join(os.tmpdir(), "rpbs-ssh-"));
    keyFile = path.join(tmp, "id_test");
    await fsp.writeFile(keyFile, "test-key-material\n");
  });

  afterEach(async () => {
    await fsp.rm(tmp, { recursive: true, force: true });
  });

  it("authenticates with the private key without prompting", async () => {
    const connection = new FakeConnection();
    const { configs, dialer } = scriptedDialer([connection]);
    const prompt = jest.fn(async () => "unused");
    const session = await connectSession(host, {
      privateKeyPath: keyFile,
      passphrase: "test-secret",
      dialer,
      promptPassword: prompt,
    });
    expect(session.host).toEqual(host);
    expect(prompt).not.toHaveBeenCalled();
    expect(configs).toHaveLength(1);
    expect(configs[0]?.privateKey?.toString()).toBe("test-key-material\n");
    expect(configs[0]?.passphrase).toBe("test-secret");
    expect(configs[0]?.host).toBe("10.0.0.5");
    expect(configs[0]?.username).toBe("alice");
  });

  it("falls back to a password when the key is rejected", async () => {
    const connection = new FakeConnection();
    const { configs, dialer } = scriptedDialer([authError(), connection]);
    const prompt = jest.fn(async (_text: string) => "test-password");
    await connectSession(host, { privateKeyPath: keyFile, dialer, promptPassword: prompt });
    expect(prompt).toHaveBeenCalledWith(
      "Key authentication failed.\nEnter your password for alice: ",
    );
    expect(configs[1]?.password).toBe("test-password");
    expect(configs[1]?.privateKey).toBeUndefined();
  });

  it("asks for a password when there is no key file", async () => {
    const { configs, dialer } = scriptedDialer([new FakeConnection()]);
    const prompt = jest.fn(async (_text: string) => "test-password");
    await connectSession(host, {
      privateKeyPath: path.join(tmp, "absent"),
      dialer,
      promptPassword: prompt,
    });
    expect(prompt).toHaveBeenCalledWith("No private key found.\nEnter your password for alice: ");
    expect(configs).toHaveLength(1);
  });

  it("does not prompt when the host cannot be reached", async () => {
    const { dialer } = scriptedDialer([socketError("ECONNREFUSED")]);
    const prompt = jest.fn(async () => "unused");
    await expect(
      connectSession(host, { privateKeyPath: keyFile, dialer, promptPassword: prompt }),
    ).rejects.toThrow("cannot connect to box (10.0.0.5:22): connect ECONNREFUSED 10.0.0.5:22");
    expect(prompt).not.toHaveBeenCalled();
  });

  it("reports a rejected password as a connection error", async () => {
    const { dialer } = scriptedDialer([authError(), authError()]);
    await expect(
      connectSession(host, {
        privateKeyPath: keyFile,
        dialer,
        promptPassword: async () => "wrong",
      }),
    ).rejects.toThrow(
      "authentication failed for alice@10.0.0.5: All configured authentication methods failed",
    );
  });
});

describe("SshSession", () => {
  it("refuses a second channel while one is open", async () => {
    const connection = new FakeConnection();
    const session = new SshSession(host, connection);
    const first = session.exec("sleep 1");
    await expect(session.exec("echo hi")).rejects.toThrow(
      "a command channel is already open",
    );
    connection.pending[0]?.({ stdout: ["ok\n"], stderr: "", code: 0 });
    await expect(first).resolves.toEqual({ stdout: ["ok\n"], stderr: "", code: 0 });

    const second = session.exec("echo hi");
    connection.pending[1]?.({ stdout: ["hi\n"], stderr: "", code: 0 });
    await expect(second).resolves.toEqual({ stdout: ["hi\n"], stderr: "", code: 0 });
  });

  it("wraps channel failures", async () => {
    const connection: SshConnection = {
      exec: async () => {
        throw new Error("Channel open failure");
      },
      end: () => {},
    };
    const session = new SshSession(host, connection);
    await expect(session.exec("ls")).rejects.toThrow("channel failed: Channel open failure");
  });

  it("closes once and rejects later commands", async () => {
    const connection = new FakeConnection();
    const session = new SshSession(host, connection);
    await session.close();
    await session.close();
    expect(connection.ended).toBe(1);
    await expect(session.exec("ls")).rejects.toBeInstanceOf(ConnectionError);
  });
});

describe("withSession", () => {
  it("closes the session when the body throws", async () => {
    const connection = new FakeConnection();
    const connect = async (h: HostRecord): Promise<RemoteSession> =>
      new SshSession(h, connection);
    await expect(
      withSession(connect, host, async () => {
        throw new Error("boom");
      }),
    ).rejects.toThrow("boom");
    expect(connection.ended).toBe(1);
  });

  it("returns the body's result and closes", async () => {
    const connection = new FakeConnection();
    const result = await withSession(
      async (h) => new SshSession(h, connection),
      host,
      async (session) => session.host[0],
    );
    expect(result).toBe("box");
    expect(connection.ended).toBe(1);
  });
});
