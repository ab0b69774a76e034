import { Role } from "../types/contracts.js";
import { defineVariant } from "./variant.js";

export const destinationRules: Array<{ role: Role; any: string[] }> = [
  { role: "STATION_MANAGER", any: ["mbta", "transit", "transportation", "station"] },
  { role: "AIRPORT_LOST_FOUND_SPECIALIST", any: ["airport", "logan"] },
  { role: "POLICE_EVIDENCE_CUSTODIAN", any: ["police", "law enforcement", "nupd", "bpd"] }
];

export function destinationApprovalRole(destinationName: string | undefined): Role {
  const dest = (destinationName ?? "").toLowerCase();
  for (const rule of destinationRules) {
    if (rule.any.some((k) => dest.includes(k))) return rule.role;
  }
  return "CAMPUS_COORDINATOR";
}

export const airportTransfer = defineVariant("airport_transfer", {
  // airport releases, campus receives, police verifies, student picks up
  approvalChain: () => ["AIRPORT_LOST_FOUND_SPECIALIST", "CAMPUS_COORDINATOR", "POLICE_EVIDENCE_CUSTODIAN", "STUDENT"],
  priorityHint: (req) => (req.secureArea ? "high" : null),
  summary: (req) =>
    `Airport Transfer: ${req.itemName} from ${req.terminal ?? "terminal"}${req.secureArea ? " [SECURE AREA]" : ""}`
});

export const transitTransfer = defineVariant("transit_transfer", {
  approvalChain: () => ["STATION_MANAGER", "CAMPUS_COORDINATOR", "STUDENT"],
  priorityHint: () => null,
  summary: (req) => `Transit Transfer: ${req.itemName} from ${req.stationName ?? "station"}`
});

export const crossCampusTransfer = defineVariant("cross_campus_transfer", {
  approvalChain: (req) => ["CAMPUS_COORDINATOR", destinationApprovalRole(req.destinationName), "STUDENT"],
  priorityHint: () => null,
  summary: (req) => `Cross-Campus Transfer: ${req.itemName} to ${req.destinationName ?? "campus"}`
});

export const emergencyTransfer = defineVariant("emergency_transfer", {
  // fast track: station releases, airport delivers
  approvalChain: () => ["STATION_MANAGER", "AIRPORT_LOST_FOUND_SPECIALIST"],
  priorityHint: () => null,
  summary: (req) => `EMERGENCY: ${req.itemName} for flight ${req.flightNumber ?? "unknown"}`
});
