// ── Packet identity ─────────────────────────────────────────────

export type PacketFormat = 2019 | 2020;

export type PacketKind =
  | "motion"
  | "session"
  | "lapData"
  | "event"
  | "participants"
  | "carSetups"
  | "carTelemetry"
  | "carStatus"
  | "finalClassification"
  | "lobbyInfo";

// ── Serializable tree ───────────────────────────────────────────

export type TreeScalar = number | string | boolean;

export type TreeNode = TreeScalar | TreeNode[] | TreeMap;

/** Field name → node, in declaration order. */
export interface TreeMap {
  [field: string]: TreeNode;
}

// ── Documents emitted to sinks ──────────────────────────────────

export interface PacketDocument {
  kind: PacketKind;
  format: PacketFormat;
  receivedAt: number; // epoch ms
  data: TreeMap;
}

export interface PipelineStats {
  received: number;
  decoded: number;
  forwarded: number;
  /** decoded packets by kind */
  byKind: Partial<Record<PacketKind, number>>;
  /** failed decodes by error name */
  errors: Record<string, number>;
}
