import { describe, it, expect } from "vitest";
import { AuthenticationError } from "../../../src/plugin-sdk/index.js";
import { missingCredentials, resolveArmCredentials } from "./credentials.js";

const ENV = {
  ARM_CLIENT_ID: "client-id",
  ARM_CLIENT_SECRET: "test-secret",
  ARM_SUBSCRIPTION_ID: "sub-1",
  ARM_TENANT_ID: "tenant-1",
};

describe("resolveArmCredentials", () => {
  it("reads all four variables", () => {
    expect(resolveArmCredentials(ENV)).toEqual({
      clientId: "client-id",
      clientSecret: "test-secret",
      subscriptionId: "sub-1",
      tenantId: "tenant-1",
    });
  });

  it("names every missing or blank variable", () => {
    const env = { ...ENV, ARM_CLIENT_SECRET: "  ", ARM_TENANT_ID: undefined };
    expect(missingCredentials(env)).toEqual(["ARM_CLIENT_SECRET", "ARM_TENANT_ID"]);
    expect(() => resolveArmCredentials(env)).toThrow(AuthenticationError);
    expect(() => resolveArmCredentials(env)).toThrow(
      "Missing Azure credentials: ARM_CLIENT_SECRET, ARM_TENANT_ID must be set",
    );
  });

  it("reports the missing names on the error", () => {
    try {
      resolveArmCredentials({});
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(AuthenticationError);
      if (!(err instanceof AuthenticationError)) return;
      expect(err.kind).toBe("authentication");
      expect(err.missing).toEqual(["ARM_CLIENT_ID", "ARM_CLIENT_SECRET", "ARM_SUBSCRIPTION_ID", "ARM_TENANT_ID"]);
    }
  });
});
