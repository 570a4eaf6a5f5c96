import { ConfigurationError } from "../utils/errors.js";

const BASIS_OFFSET = /^-(\d+)([hdw])$/;

const UNIT_MS: Record<string, number> = {
  h: 60 * 60 * 1000,
  d: 24 * 60 * 60 * 1000,
  w: 7 * 24 * 60 * 60 * 1000,
};

/**
 * Accepts "now", an offset into the past such as -2h, -4d or -1w, a Unix
 * timestamp in seconds or an RFC 3339 date. Times in the future are rejected.
 */
export function parseBasisTime(basis: string, now: Date = new Date()): Date {
  if (basis === "now") {
    return new Date(now.getTime());
  }

  const offset = BASIS_OFFSET.exec(basis);
  if (offset) {
    return new Date(now.getTime() - Number(offset[1]) * UNIT_MS[offset[2]]);
  }

  let basisTime: Date;
  if (/^\d+$/.test(basis)) {
    basisTime = new Date(Number(basis) * 1000);
  } else {
    if (!/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}(\.\d+)?(Z|[+-]\d{2}:\d{2})$/.test(basis)) {
      throw new ConfigurationError(`invalid basis time: "${basis}"`);
    }
    basisTime = new Date(basis);
  }

  if (Number.isNaN(basisTime.getTime())) {
    throw new ConfigurationError(`invalid basis time: "${basis}"`);
  }
  if (basisTime.getTime() > now.getTime()) {
    throw new ConfigurationError(`basis time should not be in the future: ${basisTime.toISOString()}`);
  }
  return basisTime;
}
