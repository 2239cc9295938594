export type GatewayErrorCode =
  | 'CONNECT_ERROR'
  | 'DEVICE_TIMEOUT'
  | 'MALFORMED_RESPONSE'
  | 'NUMERIC_PARSE_ERROR'
  | 'PEER_DISCONNECT'
  | 'SHUTDOWN_TIMEOUT'
  | 'BIND_ERROR'
  | 'CONFIG_ERROR';

export class GatewayError extends Error {
  public readonly code: GatewayErrorCode;

  constructor(code: GatewayErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Device unreachable, refused or timed out while connecting. */
export class ConnectError extends GatewayError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('CONNECT_ERROR', message, options);
  }
}

export class DeviceTimeoutError extends GatewayError {
  constructor(message: string) {
    super('DEVICE_TIMEOUT', message);
  }
}

export class ProtocolError extends GatewayError {
  public readonly response: string;

  constructor(
    code: Extract<GatewayErrorCode, 'MALFORMED_RESPONSE' | 'NUMERIC_PARSE_ERROR'>,
    message: string,
    response: string,
  ) {
    super(code, message);
    this.response = response;
  }
}

export class PeerDisconnect extends GatewayError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('PEER_DISCONNECT', message, options);
  }
}

export class ShutdownTimeout extends GatewayError {
  constructor(message: string) {
    super('SHUTDOWN_TIMEOUT', message);
  }
}

export class BindError extends GatewayError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('BIND_ERROR', message, options);
  }
}

export class ConfigError extends GatewayError {
  constructor(message: string) {
    super('CONFIG_ERROR', message);
  }
}

export function errorMessage(error: unknown): string {
  if (typeof error === 'object' && error !== null && 'message' in error) {
    return String(error.message);
  }
  return String(error);
}
