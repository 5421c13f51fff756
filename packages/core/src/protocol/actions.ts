// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Action codes shared between the hub and the agent.
 *
 * The set is versioned: adding a code requires both sides to agree on it.
 * Unknown codes are a hard dispatch error.
 */
export enum Action {
  GetData = 0,
  CheckFingerprint = 1,
  GetContainerLogs = 2,
  GetContainerInfo = 3,
  GetSmartData = 4,
  StartContainer = 5,
  StopContainer = 6,
  RestartContainer = 7,
}

/**
 * The only action reachable before the peer is verified.
 */
export const IDENTITY_CHALLENGE_ACTION = Action.CheckFingerprint;

export function isAction(code: number): code is Action {
  const name: string | undefined = Action[code];
  return name !== undefined;
}

/**
 * Readable name for logs: "GetData", or "Action(9999)" for unknown codes.
 */
export function actionName(code: number): string {
  const name: string | undefined = Action[code];
  return name ?? `Action(${code})`;
}
