export const priorities = ["low", "normal", "high", "urgent"] as const;
export type Priority = (typeof priorities)[number];

export const statuses = ["pending", "in_progress", "approved", "rejected", "completed", "cancelled"] as const;
export type Status = (typeof statuses)[number];

export const roles = [
  // higher education
  "STUDENT",
  "STAFF",
  "CAMPUS_COORDINATOR",
  "BUILDING_MANAGER",
  "CAMPUS_SECURITY",
  "UNIVERSITY_ADMIN",
  // transit
  "STATION_MANAGER",
  "LOST_FOUND_CLERK",
  "TRANSIT_SECURITY_INSPECTOR",
  "TRANSIT_OFFICER",
  "MBTA_ADMIN",
  // airport
  "AIRPORT_LOST_FOUND_SPECIALIST",
  "TSA_SECURITY_COORDINATOR",
  "AIRLINE_REPRESENTATIVE",
  "AIRPORT_ADMIN",
  // law enforcement
  "POLICE_EVIDENCE_CUSTODIAN",
  "DETECTIVE",
  "POLICE_ADMIN",
  // public
  "PUBLIC_TRAVELER",
  "SYSTEM_ADMIN"
] as const;

export type Role = (typeof roles)[number];

export interface Approver {
  id: string;
  name: string;
  role: Role;
  organizationId: string | null;
  email?: string;
  enterpriseId?: string;
}

export interface RequestBase {
  id: string;
  status: Status;
  priority: Priority;
  requesterId: string;
  requesterName?: string;
  requesterOrganizationId?: string;
  targetOrganizationId?: string | null;
  approvalStep: number;
  approverIds: string[];
  currentApproverId?: string;
  slaTargetHours?: number; // overrides the priority default
  description?: string;
  notes?: string;
  createdAt: string; // ISO
  updatedAt: string; // ISO
  completedAt?: string; // ISO
}

export type HoldingEnterpriseType = "HIGHER_EDUCATION" | "PUBLIC_TRANSIT" | "AIRPORT" | "LAW_ENFORCEMENT";

export interface ItemClaimRequest extends RequestBase {
  type: "item_claim";
  itemId: string;
  itemName: string;
  itemValue: number;
  highValue: boolean;
  holdingEnterpriseType?: HoldingEnterpriseType;
}

export interface PoliceEvidenceRequest extends RequestBase {
  type: "police_evidence";
  itemId: string;
  itemName: string;
  stolenCheck: boolean;
  verificationReason: string;
  estimatedValue?: number;
}

export interface AirportTransferRequest extends RequestBase {
  type: "airport_transfer";
  itemId: string;
  itemName: string;
  secureArea: boolean;
  terminal?: string;
}

export interface TransitTransferRequest extends RequestBase {
  type: "transit_transfer";
  itemId: string;
  itemName: string;
  stationName?: string;
}

export interface CrossCampusTransferRequest extends RequestBase {
  type: "cross_campus_transfer";
  itemId: string;
  itemName: string;
  destinationName?: string;
}

export interface EmergencyTransferRequest extends RequestBase {
  type: "emergency_transfer";
  itemId: string;
  itemName: string;
  flightNumber?: string;
}

export interface DisputeRequest extends RequestBase {
  type: "dispute";
  itemId: string;
  itemName: string;
  claimantIds: string[];
}

export type WorkRequest =
  | ItemClaimRequest
  | PoliceEvidenceRequest
  | AirportTransferRequest
  | TransitTransferRequest
  | CrossCampusTransferRequest
  | EmergencyTransferRequest
  | DisputeRequest;

export type RequestType = WorkRequest["type"];
export type RequestOf<T extends RequestType> = Extract<WorkRequest, { type: T }>;

export interface RoutingRecommendation {
  routable: boolean;
  reason: string;
  approver: Approver | null;
}

export type SelectionStrategy = "sole" | "least_busy" | "balanced";

export type RoutingEvent =
  | {
      type: "approver_selected";
      approverId: string;
      approverName: string;
      role: string;
      priority: Priority;
      strategy: SelectionStrategy;
      workload: number;
    }
  | { type: "no_approver"; role: string; organizationId: string | null }
  | { type: "workload_released"; approverId: string; workload: number }
  | { type: "workload_reset" };

export type StatusCounts = Record<Status, number> & { total: number };

export interface AuditEvent {
  id: string;
  requestId: string;
  type: string;
  actor: string; // approver/requester id, or "system"
  payload: Record<string, unknown>;
  at: string; // ISO
}
