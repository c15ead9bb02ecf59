import assert from "node:assert/strict";
import test from "node:test";
import { loadConfig } from "./config";

test("loadConfig fills defaults for an empty environment", () => {
  assert.deepEqual(loadConfig({}), {
    PORT: 3001,
    REQUEST_TIMEOUT_MS: 10000,
    BROWSER_TIMEOUT_MS: 5000,
    FETCH_RETRIES: 3,
    FETCH_RETRY_DELAY_MS: 300,
    HOTLINE_CITY_ID: 187,
    LOG_LEVEL: "info"
  });
});

test("loadConfig coerces numeric values and treats a blank DATABASE_URL as unset", () => {
  const config = loadConfig({ PORT: "8080", FETCH_RETRIES: "5", DATABASE_URL: "  ", LOG_LEVEL: "debug" });

  assert.equal(config.PORT, 8080);
  assert.equal(config.FETCH_RETRIES, 5);
  assert.equal(config.DATABASE_URL, undefined);
  assert.equal(config.LOG_LEVEL, "debug");
});

test("loadConfig rejects out-of-range values", () => {
  assert.throws(() => loadConfig({ FETCH_RETRIES: "50" }));
  assert.throws(() => loadConfig({ PORT: "-1" }));
});
