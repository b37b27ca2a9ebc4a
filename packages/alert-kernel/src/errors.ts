// Alert Kernel - error taxonomy
//
// Configuration errors are raised before any row is processed.
// Ordering violations abort merging for the run.
// Missing data is never an error.

import type { ConfigIssueV1 } from "@cropwatch/contracts";

export class ConfigError extends Error {
  public readonly code = "CONFIG_INVALID";
  public readonly issues: ConfigIssueV1[];

  constructor(issues: ConfigIssueV1[]) {
    super(`CONFIG_INVALID: ${issues.map((i) => `${i.path || "<root>"}: ${i.message}`).join("; ")}`);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

export class OrderingViolationError extends Error {
  public readonly code = "ORDERING_VIOLATION";
  public readonly dates: string[];

  constructor(message: string, dates: string[]) {
    super(`ORDERING_VIOLATION: ${message} @ ${dates.join(",")}`);
    this.name = "OrderingViolationError";
    this.dates = dates;
  }
}
