import { type KeyRange, marshalKeyRange } from "../key_range.ts";
import type { GetOpts, WatchFilter } from "../types.ts";
import { encodeBase64 } from "../util/bytes.ts";

// Request bodies in the gateway's JSON mapping. Field names are the protobuf
// names, bytes are padded base64 and 64 bit ids travel as decimal strings.

export type PutRequest = {
  key: string;
  value: string;
  lease?: string;
  prev_kv?: true;
};

export type RangeRequest = {
  key: string;
  range_end?: string;
  limit?: number;
  revision?: number;
  sort_order?: string;
  sort_target?: string;
  serializable?: true;
  keys_only?: true;
  count_only?: true;
  min_mod_revision?: number;
  max_mod_revision?: number;
  min_create_revision?: number;
  max_create_revision?: number;
};

export type DeleteRangeRequest = {
  key: string;
  range_end?: string;
  prev_kv?: true;
};

export type WatchCreateRequest = {
  create_request: {
    key: string;
    range_end?: string;
    start_revision?: number;
    progress_notify?: true;
    filters?: string[];
    prev_kv?: true;
  };
};

export function marshalPut(
  key: Uint8Array,
  value: Uint8Array,
  opts: { lease?: bigint; prevKv?: boolean } = {},
): PutRequest {
  const req: PutRequest = {
    key: encodeBase64(key),
    value: encodeBase64(value),
  };

  if (opts.lease !== undefined && opts.lease !== BigInt(0)) {
    req.lease = opts.lease.toString();
  }

  if (opts.prevKv) {
    req.prev_kv = true;
  }

  return req;
}

export function marshalRange(keys: KeyRange, opts: GetOpts = {}): RangeRequest {
  const req: RangeRequest = marshalKeyRange(keys);

  if (opts.countOnly) {
    req.count_only = true;
  }

  if (opts.keysOnly) {
    req.keys_only = true;
  }

  if (opts.limit) {
    req.limit = opts.limit;
  }

  if (opts.revision) {
    req.revision = opts.revision;
  }

  if (opts.serializable) {
    req.serializable = true;
  }

  if (opts.sortOrder) {
    req.sort_order = opts.sortOrder;
  }

  if (opts.sortTarget) {
    req.sort_target = opts.sortTarget;
  }

  if (opts.minModRevision) {
    req.min_mod_revision = opts.minModRevision;
  }

  if (opts.maxModRevision) {
    req.max_mod_revision = opts.maxModRevision;
  }

  if (opts.minCreateRevision) {
    req.min_create_revision = opts.minCreateRevision;
  }

  if (opts.maxCreateRevision) {
    req.max_create_revision = opts.maxCreateRevision;
  }

  return req;
}

export function marshalDeleteRange(
  keys: KeyRange,
  opts: { prevKv?: boolean } = {},
): DeleteRangeRequest {
  const req: DeleteRangeRequest = marshalKeyRange(keys);

  if (opts.prevKv) {
    req.prev_kv = true;
  }

  return req;
}

export function marshalWatchCreate(
  keys: KeyRange,
  opts: {
    startRevision?: number;
    progressNotify?: boolean;
    filters?: WatchFilter[];
    prevKv?: boolean;
  } = {},
): WatchCreateRequest {
  const req: WatchCreateRequest = { create_request: marshalKeyRange(keys) };

  if (opts.startRevision) {
    req.create_request.start_revision = opts.startRevision;
  }

  if (opts.progressNotify) {
    req.create_request.progress_notify = true;
  }

  if (opts.filters && opts.filters.length > 0) {
    req.create_request.filters = opts.filters.map((filter) =>
      filter === "noput" ? "NOPUT" : "NODELETE"
    );
  }

  if (opts.prevKv) {
    req.create_request.prev_kv = true;
  }

  return req;
}

export function marshalLeaseGrant(
  ttl: number,
  leaseId?: bigint,
): { TTL: number; ID: string } {
  return { TTL: ttl, ID: (leaseId ?? BigInt(0)).toString() };
}

export function marshalLeaseId(leaseId: bigint): { ID: string } {
  return { ID: leaseId.toString() };
}

export function marshalLeaseTimeToLive(
  leaseId: bigint,
  opts: { keys?: boolean } = {},
): { ID: string; keys?: true } {
  return opts.keys
    ? { ID: leaseId.toString(), keys: true }
    : { ID: leaseId.toString() };
}
