import assert from "node:assert/strict";
import test from "node:test";
import { buildServer } from "../../src/server";
import { MemoryHistoryStore } from "../../src/services/history/store";
import { buildTestConfig } from "../helpers/config";

test("GET /api/v1/health returns ok", async () => {
  const app = await buildServer({
    config: buildTestConfig({ statusApiToken: "test-secret" }),
    history: { store: new MemoryHistoryStore() },
    logger: false,
  });

  const response = await app.inject({
    method: "GET",
    url: "/api/v1/health",
  });

  assert.equal(response.statusCode, 200);
  assert.deepEqual(response.json(), {
    ok: true,
    service: "fx-rate-sentinel",
  });
  assert.ok(response.headers["x-request-id"]);

  await app.close();
});
