import type { INestApplication } from "@nestjs/common";
import { Test } from "@nestjs/testing";
import { base32upper } from "multiformats/bases/base32";
import { base58btc } from "multiformats/bases/base58";
import request from "supertest";
import { testCid } from "./support/fixtures.js";
import { InMemoryCluster } from "./support/in-memory-cluster.js";

const INFO = {
  source: "IPFS cluster API",
  warning1: "CID used for requestID. Conflicts possible",
  warning2: "experimental",
};

describe("PinsController (e2e)", () => {
  let app: INestApplication;
  const cluster = new InMemoryCluster();
  const pinned = ["e1", "e2", "e3", "e4", "e5"].map((label) => testCid(label).toString());

  beforeAll(async () => {
    process.env.NODE_ENV = "test";
    process.env.CLUSTER_RPC_ENDPOINT = "http://127.0.0.1:9094/rpc";

    const { AppModule } = await import("../src/app.module.js");
    const { RPC_CLIENT } = await import("../src/cluster-rpc/types.js");

    cluster.seed(...pinned.map((cid, i) => ({ cid, name: `archive-${i}`, metadata: { batch: "e2e" } })));

    const moduleRef = await Test.createTestingModule({ imports: [AppModule] })
      .overrideProvider(RPC_CLIENT)
      .useValue(cluster)
      .compile();

    app = moduleRef.createNestApplication();
    await app.init();
  });

  afterAll(async () => {
    await app?.close();
  });

  describe("POST /pins", () => {
    it("queues a new pin", async () => {
      const cid = testCid("e2e-doc").toString();

      const response = await request(app.getHttpServer()).post("/pins").send({ cid, name: "doc" }).expect(202);

      expect(response.body).toEqual({
        requestid: cid,
        status: "queued",
        created: "2024-05-01T10:00:00.000Z",
        pin: { cid, name: "doc", origins: [], meta: {} },
        delegates: ["/ip4/10.0.0.1/tcp/4001", "/ip4/10.0.0.2/tcp/4001"],
        info: INFO,
      });
    });

    it("rejects a body without a CID", async () => {
      const response = await request(app.getHttpServer()).post("/pins").send({ name: "doc" }).expect(400);

      expect(response.body.error.reason).toBe("BAD_REQUEST");
    });

    it("rejects a malformed CID", async () => {
      await request(app.getHttpServer())
        .post("/pins")
        .send({ cid: "not-a-cid" })
        .expect(400)
        .expect({ error: { reason: "BAD_REQUEST", details: "invalid CID: not-a-cid" } });
    });

    it("rejects non-string metadata values", async () => {
      const cid = testCid("e2e-bad-meta").toString();

      await request(app.getHttpServer())
        .post("/pins")
        .send({ cid, meta: { size: 12 } })
        .expect(400)
        .expect({ error: { reason: "BAD_REQUEST", details: "meta must be an object with string values" } });
    });
  });

  describe("POST /pins/:requestid", () => {
    it("replaces an existing pin", async () => {
      const cid = testCid("e2e-replacement").toString();

      const response = await request(app.getHttpServer())
        .post(`/pins/${pinned[0]}`)
        .send({ cid, name: "replacement" })
        .expect(202);

      expect(response.body.requestid).toBe(cid);
      expect(response.body.status).toBe("queued");
      expect(cluster.callsTo("Pin").at(-1)?.args).toMatchObject({ cid, pin_update: pinned[0] });
    });
  });

  describe("GET /pins/:requestid", () => {
    it("returns the aggregated status", async () => {
      const response = await request(app.getHttpServer()).get(`/pins/${pinned[1]}`).expect(200);

      expect(response.body).toMatchObject({
        requestid: pinned[1],
        status: "pinned",
        pin: { cid: pinned[1], name: "archive-1", meta: { batch: "e2e" } },
      });
    });

    it("accepts a request id in another multibase encoding", async () => {
      const cid = testCid("e1");

      const upper = await request(app.getHttpServer()).get(`/pins/${cid.toString(base32upper)}`).expect(200);
      const base58 = await request(app.getHttpServer()).get(`/pins/${cid.toString(base58btc)}`).expect(200);

      expect(upper.body.requestid).toBe(pinned[0]);
      expect(base58.body.requestid).toBe(pinned[0]);
    });

    it("answers 404 for an unknown pin", async () => {
      const cid = testCid("e2e-unknown").toString();

      await request(app.getHttpServer())
        .get(`/pins/${cid}`)
        .expect(404)
        .expect({ error: { reason: "NOT_FOUND", details: `pin not found: ${cid}` } });
    });

    it("answers 400 for a malformed request id", async () => {
      await request(app.getHttpServer()).get("/pins/not-a-cid").expect(400);
    });
  });

  describe("DELETE /pins/:requestid", () => {
    it("signals not found for a nonexistent pin", async () => {
      const cid = testCid("e2e-never-pinned").toString();

      const response = await request(app.getHttpServer()).delete(`/pins/${cid}`).expect(404);

      expect(response.body.error.reason).toBe("NOT_FOUND");
    });

    it("accepts removal of an existing pin", async () => {
      const cid = testCid("e2e-to-remove").toString();
      cluster.seed({ cid });

      await request(app.getHttpServer()).delete(`/pins/${cid}`).expect(202);
      expect(cluster.has(cid)).toBe(false);
    });
  });

  describe("GET /pins", () => {
    it("caps results at the limit", async () => {
      const response = await request(app.getHttpServer()).get("/pins?limit=2").expect(200);

      expect(response.body.count).toBe(2);
      expect(response.body.results.map((status: { requestid: string }) => status.requestid)).toEqual(
        pinned.slice(0, 2),
      );
    });

    it("filters by name", async () => {
      const response = await request(app.getHttpServer()).get("/pins?name=archive-3").expect(200);

      expect(response.body.count).toBe(1);
      expect(response.body.results[0].requestid).toBe(pinned[3]);
    });

    it("looks up explicit CIDs", async () => {
      const response = await request(app.getHttpServer())
        .get(`/pins?cid=${pinned[2]},${pinned[4]}`)
        .expect(200);

      expect(response.body.count).toBe(2);
      expect(response.body.results.map((status: { requestid: string }) => status.requestid).sort()).toEqual(
        [pinned[2], pinned[4]].sort(),
      );
    });

    it("applies filters to explicit CIDs", async () => {
      const cid = [pinned[2], pinned[3], pinned[4]].join(",");

      const matching = await request(app.getHttpServer())
        .get("/pins")
        .query({ cid, name: "archive-3", meta: JSON.stringify({ batch: "e2e" }) })
        .expect(200);
      const failed = await request(app.getHttpServer())
        .get("/pins")
        .query({ cid, name: "archive-3", status: "failed" })
        .expect(200);

      expect(matching.body.count).toBe(1);
      expect(matching.body.results[0].requestid).toBe(pinned[3]);
      expect(failed.body).toEqual({ count: 0, results: [] });
    });

    it("fails the whole request when an explicit lookup fails", async () => {
      const missing = testCid("e2e-missing").toString();

      const response = await request(app.getHttpServer()).get(`/pins?cid=${pinned[2]},${missing}`).expect(500);

      expect(response.body).toEqual({
        error: { reason: "INTERNAL_SERVER_ERROR", details: `1 status lookup(s) failed: ${missing}: not found` },
      });
    });

    it("rejects unknown query parameters", async () => {
      const response = await request(app.getHttpServer()).get("/pins?sort=name").expect(400);

      expect(response.body.error.reason).toBe("BAD_REQUEST");
    });
  });
});
