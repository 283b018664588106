import { describe, expect, it, vi } from "vitest";
import { ProtocolError, RpcError } from "../../errors/updaterErrors.js";
import { silentLogger } from "../../telemetry/logger.js";
import type { CreateVmRequest } from "../../types/vmm.js";
import { rpcUrl } from "../rpcTransport.js";
import { PrpcVmmClient } from "../vmmClient.js";

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { "content-type": "application/json" } });
}

function clientWith(respond: (url: string, body: unknown) => Response | Promise<Response>) {
  const fetchFn = vi.fn(async (input: string | URL | Request, init?: RequestInit) => {
    const body: unknown = init?.body ? JSON.parse(String(init.body)) : undefined;
    return respond(String(input), body);
  });
  const client = new PrpcVmmClient({ baseUrl: "http://vmm.test:10300/", timeoutMs: 1000, fetchFn, logger: silentLogger() });
  return { client, fetchFn };
}

const createRequest: CreateVmRequest = {
  name: "validator_vm",
  image: "dstack-0.5.2",
  compose_file: "{}",
  vcpu: 2,
  memory: 2048,
  disk_size: 20,
  user_config: "",
  ports: [{ protocol: "tcp", host_port: 8080, vm_port: 80, host_address: null }],
  encrypted_env: "00",
  hugepages: false,
  pin_numa: false,
  stopped: false
};

describe("rpcUrl", () => {
  it("strips trailing slashes from the base URL", () => {
    expect(rpcUrl("http://vmm.test:10300///", "Status")).toBe("http://vmm.test:10300/prpc/Status?json");
    expect(rpcUrl("http://vmm.test:10300", "RemoveVm")).toBe("http://vmm.test:10300/prpc/RemoveVm?json");
  });
});

describe("PrpcVmmClient", () => {
  it("posts JSON to the method endpoint", async () => {
    const { client, fetchFn } = clientWith(() => new Response("", { status: 200 }));
    await client.stopVm("vm-1");

    expect(fetchFn).toHaveBeenCalledTimes(1);
    const [url, init] = fetchFn.mock.calls[0];
    expect(String(url)).toBe("http://vmm.test:10300/prpc/StopVm?json");
    expect(init?.method).toBe("POST");
    expect(init?.body).toBe('{"id":"vm-1"}');
  });

  it("maps status entries and falls back to app_id", async () => {
    const { client } = clientWith(() =>
      jsonResponse({
        vms: [
          { id: "a", name: "validator_vm", status: "running", appId: "abc" },
          { id: "b", name: "other", app_id: "def" },
          { id: "c", name: "third", status: 3 }
        ]
      })
    );
    const { vms } = await client.status();
    expect(vms.map(({ id, name, status, appId }) => ({ id, name, status, appId }))).toEqual([
      { id: "a", name: "validator_vm", status: "running", appId: "abc" },
      { id: "b", name: "other", status: "unknown", appId: "def" },
      { id: "c", name: "third", status: "unknown", appId: undefined }
    ]);
    expect(vms[1].raw).toEqual({ id: "b", name: "other", app_id: "def" });
  });

  it("rejects a status response without a vms array", async () => {
    const { client } = clientWith(() => jsonResponse({ machines: [] }));
    await expect(client.status()).rejects.toBeInstanceOf(ProtocolError);
  });

  it("sends app_id and reads public_key", async () => {
    const { client, fetchFn } = clientWith(() => jsonResponse({ public_key: "0xabc" }));
    await expect(client.getAppEnvEncryptPubKey("a".repeat(40))).resolves.toEqual({ publicKey: "0xabc" });
    expect(fetchFn.mock.calls[0][1]?.body).toBe(JSON.stringify({ app_id: "a".repeat(40) }));
  });

  it("fails with ProtocolError when an expected field is missing", async () => {
    const { client } = clientWith(() => jsonResponse({ key: "0xabc" }));
    await expect(client.getAppEnvEncryptPubKey("x")).rejects.toThrow("GetAppEnvEncryptPubKey response.public_key: expected a string");
  });

  it("returns the created VM id and the VMM hash", async () => {
    const { client, fetchFn } = clientWith((url) =>
      url.includes("/CreateVm") ? jsonResponse({ id: "vm-9" }) : jsonResponse({ hash: "feed" })
    );
    await expect(client.getComposeHash(createRequest)).resolves.toEqual({ hash: "feed" });
    await expect(client.createVm(createRequest)).resolves.toEqual({ id: "vm-9" });
    expect(JSON.parse(String(fetchFn.mock.calls[1][1]?.body))).toEqual(createRequest);
  });

  it("turns a non-2xx response into an RpcError with method, status and body", async () => {
    const { client } = clientWith(() => new Response("vm is busy", { status: 409 }));
    const err = await client.removeVm("vm-1").catch((e: unknown) => e);
    expect(err).toBeInstanceOf(RpcError);
    expect(err).toMatchObject({ method: "RemoveVm", status: 409, body: "vm is busy", kind: "network" });
    expect(String(err)).toContain("RPC RemoveVm failed with status 409: vm is busy");
  });

  it("turns a transport failure into an RpcError", async () => {
    const { client } = clientWith(() => {
      throw new TypeError("fetch failed");
    });
    await expect(client.status()).rejects.toMatchObject({ method: "Status", message: "RPC Status failed: fetch failed" });
  });

  it("rejects a 2xx body that is not JSON", async () => {
    const { client } = clientWith(() => new Response("<html>", { status: 200 }));
    await expect(client.createVm(createRequest)).rejects.toBeInstanceOf(ProtocolError);
  });
});
