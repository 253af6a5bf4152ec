/**
 * Azure Policy Manager — Unit Tests
 */

import { describe, it, expect, vi, beforeEach } from "vitest";
import { RestError } from "@azure/core-rest-pipeline";
import { AuthorizationError, DependencyOrderError, ProviderError } from "../../../src/plugin-sdk/index.js";
import { AzurePolicyManager } from "./manager.js";

const mockPolicyDefinitions = {
  get: vi.fn(),
  getBuiltIn: vi.fn(),
  createOrUpdate: vi.fn(),
  delete: vi.fn(),
};
const mockPolicyAssignments = {
  get: vi.fn(),
  create: vi.fn(),
  delete: vi.fn(),
};

vi.mock("@azure/arm-policy", () => ({
  PolicyClient: vi.fn().mockImplementation(function () {
    return {
      policyDefinitions: mockPolicyDefinitions,
      policyAssignments: mockPolicyAssignments,
    };
  }),
}));

const credential = { getToken: vi.fn() };
const SUB = "/subscriptions/sub-1";
const DEF_ID = `${SUB}/providers/Microsoft.Authorization/policyDefinitions/allowed-location`;
const ASSIGN_ID = `${SUB}/providers/Microsoft.Authorization/policyAssignments/allowed-location`;
const RULE = { if: { field: "location", notEquals: "eastus" }, then: { effect: "deny" } };

describe("AzurePolicyManager", () => {
  let mgr: AzurePolicyManager;

  beforeEach(() => {
    vi.clearAllMocks();
    mgr = new AzurePolicyManager(credential, "sub-1");
  });

  describe("definitions", () => {
    it("reads a definition and drops server metadata", async () => {
      mockPolicyDefinitions.get.mockResolvedValue({
        id: DEF_ID,
        name: "allowed-location",
        policyType: "Custom",
        mode: "All",
        displayName: "Allowed location",
        policyRule: RULE,
        metadata: { category: "General", createdBy: "someone", createdOn: "2024-01-01T00:00:00Z" },
      });
      const def = await mgr.getDefinition(DEF_ID);
      expect(mockPolicyDefinitions.get).toHaveBeenCalledWith("allowed-location");
      expect(def).toEqual({
        id: DEF_ID,
        name: "allowed-location",
        policyType: "Custom",
        mode: "All",
        displayName: "Allowed location",
        description: "",
        policyRule: RULE,
        parameters: {},
        metadata: { category: "General" },
      });
    });

    it("reads tenant built-ins through getBuiltIn", async () => {
      mockPolicyDefinitions.getBuiltIn.mockResolvedValue({ id: "/providers/Microsoft.Authorization/policyDefinitions/b1", name: "b1" });
      await mgr.getDefinition("/providers/Microsoft.Authorization/policyDefinitions/b1");
      expect(mockPolicyDefinitions.getBuiltIn).toHaveBeenCalledWith("b1");
    });

    it("returns null for a missing definition", async () => {
      mockPolicyDefinitions.get.mockRejectedValue(new RestError("not found", { statusCode: 404, code: "PolicyDefinitionNotFound" }));
      await expect(mgr.getDefinition(DEF_ID)).resolves.toBeNull();
    });

    it("creates or updates by name", async () => {
      mockPolicyDefinitions.createOrUpdate.mockImplementation(async (name: string, body: Record<string, unknown>) => ({
        ...body,
        id: DEF_ID,
        name,
      }));
      const def = await mgr.putDefinition({
        name: "allowed-location",
        policyType: "Custom",
        mode: "All",
        displayName: "Allowed location",
        description: "Only eastus",
        policyRule: RULE,
        parameters: {},
        metadata: {},
      });
      expect(def.id).toBe(DEF_ID);
      expect(mockPolicyDefinitions.createOrUpdate).toHaveBeenCalledWith(
        "allowed-location",
        expect.objectContaining({ policyRule: RULE, policyType: "Custom", mode: "All" }),
      );
    });

    it("maps 403 to an authorization error", async () => {
      mockPolicyDefinitions.createOrUpdate.mockRejectedValue(
        new RestError("The client does not have authorization", { statusCode: 403, code: "AuthorizationFailed" }),
      );
      const put = mgr.putDefinition({
        name: "d",
        policyType: "Custom",
        mode: "All",
        displayName: "d",
        description: "",
        policyRule: RULE,
        parameters: {},
        metadata: {},
      });
      await expect(put).rejects.toBeInstanceOf(AuthorizationError);
      await expect(put).rejects.toThrow(
        "Authorization failed for Microsoft.Authorization/policyDefinitions/write at /subscriptions/sub-1: The client does not have authorization",
      );
    });
  });

  describe("assignments", () => {
    it("creates an assignment with wrapped parameter values", async () => {
      mockPolicyAssignments.create.mockResolvedValue({
        id: ASSIGN_ID,
        name: "allowed-location",
        scope: SUB,
        policyDefinitionId: DEF_ID,
        displayName: "Allowed location",
        enforcementMode: "Default",
        parameters: { effect: { value: "deny" } },
      });
      const created = await mgr.putAssignment({
        name: "allowed-location",
        scope: SUB,
        policyDefinitionId: DEF_ID,
        displayName: "Allowed location",
        description: "",
        enforcementMode: "Default",
        parameters: { effect: "deny" },
        notScopes: [],
      });
      expect(mockPolicyAssignments.create).toHaveBeenCalledWith(
        SUB,
        "allowed-location",
        expect.objectContaining({ parameters: { effect: { value: "deny" } } }),
      );
      expect(created.parameters).toEqual({ effect: "deny" });
      expect(created.notScopes).toEqual([]);
    });

    it("classifies a missing definition as a dependency error", async () => {
      mockPolicyAssignments.create.mockRejectedValue(
        new RestError("The policy definition could not be found", { statusCode: 404, code: "PolicyDefinitionNotFound" }),
      );
      await expect(
        mgr.putAssignment({
          name: "a",
          scope: SUB,
          policyDefinitionId: DEF_ID,
          displayName: "a",
          description: "",
          enforcementMode: "Default",
          parameters: {},
          notScopes: [],
        }),
      ).rejects.toBeInstanceOf(DependencyOrderError);
    });

    it("splits the assignment ID for get and delete", async () => {
      mockPolicyAssignments.get.mockRejectedValue(new RestError("gone", { statusCode: 404 }));
      await expect(mgr.getAssignment(ASSIGN_ID)).resolves.toBeNull();
      expect(mockPolicyAssignments.get).toHaveBeenCalledWith(SUB, "allowed-location");

      mockPolicyAssignments.delete.mockResolvedValue(undefined);
      await mgr.deleteAssignment(ASSIGN_ID);
      expect(mockPolicyAssignments.delete).toHaveBeenCalledWith(SUB, "allowed-location");
    });

    it("wraps other platform failures", async () => {
      mockPolicyAssignments.delete.mockRejectedValue(new RestError("throttled", { statusCode: 429, code: "TooManyRequests" }));
      const del = mgr.deleteAssignment(ASSIGN_ID);
      await expect(del).rejects.toBeInstanceOf(ProviderError);
      await expect(del).rejects.toMatchObject({ code: "TooManyRequests", kind: "provider" });
    });
  });
});
