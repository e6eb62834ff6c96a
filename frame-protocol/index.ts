export { TelemetryFrameProtocol, FRAME_PROTOCOL } from './TelemetryFrameProtocol';
