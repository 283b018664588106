import { describe, expect, it, vi } from "vitest";
import { ProtocolError, TransientNetworkError } from "../../errors/updaterErrors.js";
import { silentLogger } from "../../telemetry/logger.js";
import { ComposeConfigClient, defaultManifestDefaults, defaultVmParameters, parseComposeConfig } from "../composeConfigClient.js";

const minimal = {
  vm_type: "validator",
  compose_content: "services:\n  app:\n    image: example/app:1\n",
  updated_at: "2026-10-01T00:00:00Z"
};

describe("parseComposeConfig", () => {
  it("applies whole-section defaults when provisioning is absent", () => {
    const config = parseComposeConfig(minimal);
    expect(config.requiredEnv).toEqual([]);
    expect(config.description).toBeUndefined();
    expect(config.provisioning.envKeys).toEqual([]);
    expect(config.provisioning.manifestDefaults).toEqual(defaultManifestDefaults());
    expect(config.provisioning.vmParameters).toEqual(defaultVmParameters());
    expect(config.provisioning.vmParameters).toMatchObject({ image: "dstack-0.5.2", vcpu: 16, memory: 16384, diskSize: 200 });
  });

  it("defaults optional fields inside a present section to off", () => {
    const config = parseComposeConfig({
      ...minimal,
      provisioning: { manifest_defaults: { manifest_version: 3, runner: "docker-compose" } }
    });
    expect(config.provisioning.manifestDefaults).toEqual({
      manifestVersion: 3,
      name: undefined,
      runner: "docker-compose",
      kmsEnabled: false,
      gatewayEnabled: false,
      localKeyProviderEnabled: false,
      keyProviderId: "",
      publicLogs: false,
      publicSysinfo: false,
      publicTcbinfo: false,
      noInstanceId: false,
      secureTime: false
    });
  });

  it("reads VM parameters and port mappings", () => {
    const config = parseComposeConfig({
      ...minimal,
      description: "validator stack",
      required_env: ["FOO"],
      provisioning: {
        env_keys: ["BAR"],
        vm_parameters: {
          name: "vm-x",
          image: "img-2",
          vcpu: 4,
          memory: 8192,
          disk_size: 50,
          ports: [{ host_port: 8080, vm_port: 80 }, { protocol: "udp", host_port: 53, vm_port: 53, host_address: "127.0.0.1" }],
          hugepages: true
        }
      }
    });
    expect(config.description).toBe("validator stack");
    expect(config.requiredEnv).toEqual(["FOO"]);
    expect(config.provisioning.envKeys).toEqual(["BAR"]);
    expect(config.provisioning.vmParameters).toEqual({
      name: "vm-x",
      image: "img-2",
      vcpu: 4,
      memory: 8192,
      diskSize: 50,
      userConfig: "",
      ports: [
        { protocol: "tcp", hostPort: 8080, vmPort: 80, hostAddress: undefined },
        { protocol: "udp", hostPort: 53, vmPort: 53, hostAddress: "127.0.0.1" }
      ],
      hugepages: true,
      pinNuma: false,
      stopped: false
    });
  });

  it("requires the top-level fields", () => {
    expect(() => parseComposeConfig({ compose_content: "x", updated_at: "t" })).toThrow("compose config.vm_type: expected a string");
  });

  it("requires image and sizes once vm_parameters is present", () => {
    expect(() => parseComposeConfig({ ...minimal, provisioning: { vm_parameters: { image: "i", vcpu: 1, memory: 1 } } })).toThrow(
      ProtocolError
    );
  });

  it("rejects out-of-range ports", () => {
    const doc = {
      ...minimal,
      provisioning: { vm_parameters: { image: "i", vcpu: 1, memory: 1, disk_size: 1, ports: [{ host_port: 70000, vm_port: 1 }] } }
    };
    expect(() => parseComposeConfig(doc)).toThrow("host_port");
  });
});

describe("ComposeConfigClient", () => {
  function client(response: () => Response) {
    const fetchFn = vi.fn(async (_input: string | URL | Request, _init?: RequestInit) => response());
    return {
      fetchFn,
      client: new ComposeConfigClient({ url: "http://api.test/config", timeoutMs: 1000, fetchFn, logger: silentLogger() })
    };
  }

  it("fetches and parses the desired config", async () => {
    const { client: c, fetchFn } = client(() => new Response(JSON.stringify(minimal), { status: 200 }));
    const config = await c.fetch();
    expect(config.vmType).toBe("validator");
    expect(String(fetchFn.mock.calls[0][0])).toBe("http://api.test/config");
    expect(fetchFn.mock.calls[0][1]?.method).toBe("GET");
  });

  it("reports the status and body of a failed fetch", async () => {
    const { client: c } = client(() => new Response("maintenance", { status: 503 }));
    const err = await c.fetch().catch((e: unknown) => e);
    expect(err).toBeInstanceOf(TransientNetworkError);
    expect(err).toMatchObject({ status: 503, body: "maintenance" });
  });

  it("fails with ProtocolError on a body that is not JSON", async () => {
    const { client: c } = client(() => new Response("not json", { status: 200 }));
    await expect(c.fetch()).rejects.toBeInstanceOf(ProtocolError);
  });
});
