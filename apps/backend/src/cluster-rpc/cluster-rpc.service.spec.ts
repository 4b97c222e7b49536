import { Test, type TestingModule } from "@nestjs/testing";
import { describe, expect, it } from "vitest";
import { testCid } from "../../test/support/fixtures.js";
import { InMemoryCluster } from "../../test/support/in-memory-cluster.js";
import { counterValue, createTestMetrics } from "../../test/support/metrics.js";
import { ClusterRpcError } from "../common/errors.js";
import { ClusterRpcService } from "./cluster-rpc.service.js";
import { trackerStatusSet } from "./tracker-status.js";
import { RPC_CLIENT, type RpcClient, TrackerStatus } from "./types.js";

describe("ClusterRpcService", () => {
  const createService = async (rpcClient: RpcClient) => {
    const metrics = createTestMetrics();
    const module: TestingModule = await Test.createTestingModule({
      providers: [ClusterRpcService, { provide: RPC_CLIENT, useValue: rpcClient }, ...metrics.providers],
    }).compile();

    return { service: module.get<ClusterRpcService>(ClusterRpcService), metrics };
  };

  it("decodes a status reply and counts the call as a success", async () => {
    const cluster = new InMemoryCluster();
    const cid = testCid("svc-status");
    cluster.seed({ cid: cid.toString(), name: "doc" });
    const { service, metrics } = await createService(cluster);

    const gpi = await service.status(cid);

    expect(gpi.name).toBe("doc");
    expect(gpi.peerMap.size).toBe(2);
    expect(cluster.calls[0]).toEqual({ dest: "", service: "Cluster", method: "Status", args: cid.toString() });
    expect(await counterValue(metrics.rpcCalls, { method: "Status", outcome: "success" })).toBe(1);
  });

  it("sends the tracker filter of statusAll in wire form", async () => {
    const cluster = new InMemoryCluster();
    const { service } = await createService(cluster);

    await service.statusAll(trackerStatusSet(TrackerStatus.PINNED, TrackerStatus.PIN_QUEUED));

    expect(cluster.callsTo("StatusAll")[0]?.args).toEqual(["pin_queued", "pinned"]);
  });

  it("passes not-found failures through and counts them separately", async () => {
    const cluster = new InMemoryCluster();
    const { service, metrics } = await createService(cluster);

    const error = await service.unpin(testCid("svc-missing")).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ClusterRpcError);
    expect(error instanceof ClusterRpcError && error.isNotFound()).toBe(true);
    expect(await counterValue(metrics.rpcCalls, { method: "Unpin", outcome: "not_found" })).toBe(1);
  });

  it("rejects replies that do not decode", async () => {
    const rpcClient: RpcClient = { call: async () => ({ unexpected: true }) };
    const { service, metrics } = await createService(rpcClient);

    await expect(service.status(testCid("svc-garbage"))).rejects.toMatchObject({
      name: "ClusterRpcError",
      code: "INVALID_REPLY",
    });
    expect(await counterValue(metrics.rpcCalls, { method: "Status", outcome: "error" })).toBe(1);
  });

  it("counts calls cancelled by the caller as aborted", async () => {
    const cluster = new InMemoryCluster();
    const { service, metrics } = await createService(cluster);
    const controller = new AbortController();
    controller.abort(new Error("client disconnected"));

    await expect(service.peers(controller.signal)).rejects.toThrow("client disconnected");
    expect(await counterValue(metrics.rpcCalls, { service: "Consensus", outcome: "aborted" })).toBe(1);
  });

  it("lists peers through the consensus service", async () => {
    const cluster = new InMemoryCluster();
    const { service } = await createService(cluster);

    await expect(service.peers()).resolves.toEqual(["peer-a", "peer-b"]);
    expect(cluster.calls[0]).toEqual({ dest: "", service: "Consensus", method: "Peers", args: {} });
  });
});
