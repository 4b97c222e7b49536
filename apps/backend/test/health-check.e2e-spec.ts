import type { INestApplication } from "@nestjs/common";
import { Test } from "@nestjs/testing";
import request from "supertest";
import { InMemoryCluster } from "./support/in-memory-cluster.js";

describe("AppController (e2e)", () => {
  let app: INestApplication;

  beforeAll(async () => {
    // env required by Joi schema BEFORE AppModule import
    process.env.NODE_ENV = "test";
    process.env.CLUSTER_RPC_ENDPOINT = "http://127.0.0.1:9094/rpc";
    process.env.PINSVC_MAX_CIDS = "5";

    // dynamic import after env is set (ConfigModule validates on import)
    const { AppModule } = await import("../src/app.module.js");
    const { RPC_CLIENT } = await import("../src/cluster-rpc/types.js");

    const moduleRef = await Test.createTestingModule({ imports: [AppModule] })
      .overrideProvider(RPC_CLIENT)
      .useValue(new InMemoryCluster())
      .compile();

    app = moduleRef.createNestApplication();
    await app.init();
  });

  afterAll(async () => {
    await app?.close();
  });

  it("/api/health (GET)", async () => {
    await request(app.getHttpServer()).get("/api/health").expect(200).expect({ status: "ok" });
  });

  it("/api/config (GET)", async () => {
    await request(app.getHttpServer())
      .get("/api/config")
      .expect(200)
      .expect({ pinsvc: { statusConcurrency: 10, maxCids: 5 } });
  });

  it("/metrics (GET)", async () => {
    const response = await request(app.getHttpServer()).get("/metrics").expect(200);

    expect(response.text).toContain("# TYPE http_requests_total counter");
  });
});
