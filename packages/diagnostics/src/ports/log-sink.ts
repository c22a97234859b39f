import type { Logger } from "@keytrace/logger"

/**
 * The part of a Logger the diagnostics helpers write to.
 */
export type LogSink = Pick<Logger, "log">
