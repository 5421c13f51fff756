// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

export { checkFingerprintHandler } from "./check-fingerprint.js";
export {
  CONTAINER_ACK,
  DEFAULT_STOP_TIMEOUT_SECONDS,
  resolveStopTimeout,
  restartContainerHandler,
  startContainerHandler,
  stopContainerHandler,
} from "./container-control.js";
export { getContainerInfoHandler } from "./container-info.js";
export { getContainerLogsHandler } from "./container-logs.js";
export { getDataHandler } from "./get-data.js";
export { getSmartDataHandler } from "./smart-data.js";
