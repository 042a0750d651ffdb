/** Gateway paths, relative to the API prefix (e.g. `/v3`). */
export const Endpoints = {
  Status: "maintenance/status",
  Put: "kv/put",
  Range: "kv/range",
  DeleteRange: "kv/deleterange",
  Txn: "kv/txn",
  Watch: "watch",
  LeaseGrant: "lease/grant",
  LeaseKeepAlive: "lease/keepalive",
  LeaseRevoke: "kv/lease/revoke",
  LeaseTimeToLive: "kv/lease/timetolive",
} as const;

export type Endpoint = typeof Endpoints[keyof typeof Endpoints];
