/**
 * CHANGE: Centralized re-exports of the Node built-ins the SHELL touches
 *
 * Invariant: re-export through constants rather than `export *`, since
 * node:path and node:fs are declared with `export =`.
 */
import * as fsNS from "node:fs";
import * as pathNS from "node:path";

export const fs = fsNS;
export const path = pathNS;
