/**
 * @beam/node
 *
 * Node.js host for the Beam engine: control endpoint, drivers, environment
 * configuration and console logging.
 */

export { type BeamNodeConfig, DEFAULT_NODE_CONFIG, type DriverKind, loadBeamConfig } from "./config.js";
export { type ConsoleLogSinkOptions, createConsoleLogSink } from "./log.js";
export {
  CONTROL_PATH,
  type ControlRequest,
  type ControlResponse,
  type WireSnapshot,
  handleControlRequest,
  toWireSnapshot,
} from "./control/handler.js";
export {
  type ControlServer,
  type ControlServerOptions,
  MAX_BODY_BYTES,
  type ReadBodyResult,
  createControlServer,
  readBody,
} from "./control/server.js";
export {
  CHANNEL_ORDERS,
  type ChannelOrder,
  type EncodeOptions,
  applyBrightness,
  encodeFrame,
  isChannelOrder,
  stripIndex,
} from "./drivers/encode.js";
export {
  type SerialDriver,
  type SerialDriverOptions,
  createSerialDriver,
  openSerialDriver,
} from "./drivers/serial.js";
export { type TerminalDriverOptions, createTerminalDriver, renderFrameText } from "./drivers/terminal.js";
export { type BeamRuntime, type BeamRuntimeOptions, createBeamRuntime } from "./runtime.js";
