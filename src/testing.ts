/**
 * Test utilities, exported from the `"cuebridge/testing"` entry point.
 * Host fakes and raw socket peers for exercising a running daemon.
 */
export type { RecordedCall } from "./testing/recording-host.js";
export { deferred, makeCommand, RecordingHost, waitFor } from "./testing/recording-host.js";
export type { DatagramSender, LineClient } from "./testing/socket-helpers.js";
export { connectLineClient, createDatagramSender, sleep } from "./testing/socket-helpers.js";
