/**
 * Policy control-plane surface used by the resource handlers. Implemented
 * by the ARM-backed manager and by the in-process control plane.
 */

import type {
  PolicyAssignmentRecord,
  PolicyAssignmentSpec,
  PolicyDefinitionRecord,
  PolicyDefinitionSpec,
} from "./types.js";

export interface PolicyService {
  /** Subscription definitions are created in. */
  readonly subscriptionId: string;
  getDefinition(id: string): Promise<PolicyDefinitionRecord | null>;
  putDefinition(spec: PolicyDefinitionSpec): Promise<PolicyDefinitionRecord>;
  deleteDefinition(id: string): Promise<void>;
  getAssignment(id: string): Promise<PolicyAssignmentRecord | null>;
  putAssignment(spec: PolicyAssignmentSpec): Promise<PolicyAssignmentRecord>;
  deleteAssignment(id: string): Promise<void>;
}

/** Resource group writes, used to probe what the assigned policies allow. */
export interface ResourceGroupService {
  createOrUpdate(name: string, location: string, tags?: Record<string, string>): Promise<{ id: string; location: string }>;
  delete(name: string): Promise<void>;
}
