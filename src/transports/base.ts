import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { TransportType } from '../utils/requestContext.js';

/**
 * Builds a fresh SDK protocol server for one client session. Each session
 * gets its own instance; the tool registry behind it is shared.
 */
export type ProtocolServerFactory = () => Server;

export interface TransportAddress {
  host: string;
  port: number;
}

export abstract class AbstractTransport {
  abstract readonly type: TransportType;

  protected _onclose?: () => void;
  protected _onerror?: (error: Error) => void;

  set onclose(handler: (() => void) | undefined) {
    this._onclose = handler;
  }

  set onerror(handler: ((error: Error) => void) | undefined) {
    this._onerror = handler;
  }

  abstract start(): Promise<void>;
  abstract close(): Promise<void>;
  abstract isRunning(): boolean;

  /** Bound address for network transports once started. */
  address(): TransportAddress | undefined {
    return undefined;
  }
}
