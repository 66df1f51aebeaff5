export enum RouteDirection {
  GATEWAY = "GATEWAY",
  DOWNSTREAM = "DOWNSTREAM",
}

export enum ReasonCategory {
  CONFIGURATION = "CONFIGURATION",
  ADDRESS = "ADDRESS",
  ROUTING = "ROUTING",
}

// What the caller is expected to do with the message once a rejection is raised.
export enum Disposition {
  ABORT = "ABORT",
  REJECT = "REJECT",
  DELIVERED = "DELIVERED",
  UNROUTABLE = "UNROUTABLE",
}

export enum SubtreeMatch {
  PREFIX = "prefix",
  TOKEN = "token",
}

export type ReasonCode =
  | "CONFIG_MISSING_VALUE"
  | "CONFIG_INVALID_VALUE"
  | "ADDRESS_TOO_SHORT"
  | "ADDRESS_NOT_ROOTED"
  | "ADDRESS_EMPTY_TOKEN"
  | "ADDRESS_ILLEGAL_TOKEN"
  | "ROUTE_SELF"
  | "ROUTE_TOP_LEVEL";

export type AddressViolation = "TOO_SHORT" | "NOT_ROOTED" | "EMPTY_TOKEN" | "ILLEGAL_TOKEN";

export interface ReasonDetail {
  code: ReasonCode;
  category: ReasonCategory;
  disposition: Disposition;
  message: string;
  context?: Record<string, string | number | boolean>;
}

export interface RouteDecision {
  direction: RouteDirection;
  destination: string;
  nextHopAddress: string;
  channel: string;
}
