import { EventEmitter } from 'node:events';
import type { Application, ReceiverSession } from 'castv2-client';
import type { CastClient } from '../../src/adapters/cast/castDevice';

type Done<T> = (error: Error | null, result: T) => void;

/**
 * Stands in for a castv2-client connection. Receiver status is answered from
 * `status`; app launches and joins are recorded but never complete.
 */
export class FakeCastClient extends EventEmitter implements CastClient {
  public closes = 0;
  public readonly calls: string[] = [];
  public readonly receiver = {
    launch: (appId: string, callback: Done<ReceiverSession[]>): void => {
      this.calls.push(`receiver.launch:${appId}`);
      callback(null, []);
    },
    stop: (sessionId: string, callback: Done<ReceiverSession[]>): void => {
      this.calls.push(`receiver.stop:${sessionId}`);
      callback(null, []);
    },
  };

  constructor(public status: unknown = { volume: { level: 0.4, muted: false } }) {
    super();
  }

  public getStatus(callback: Done<unknown>): void {
    callback(null, this.status);
  }

  public getSessions(callback: Done<ReceiverSession[]>): void {
    callback(null, []);
  }

  public join<T extends Application>(
    session: ReceiverSession,
    _application: new (client: unknown, session: ReceiverSession) => T,
    _callback: Done<T>,
  ): void {
    this.calls.push(`join:${session.sessionId}`);
  }

  public launch<T extends Application>(
    _application: (new (client: unknown, session: ReceiverSession) => T) & { APP_ID: string },
    _callback: Done<T>,
  ): void {
    this.calls.push('launch');
  }

  public setVolume(volume: { level?: number; muted?: boolean }, callback: Done<unknown>): void {
    this.calls.push(`setVolume:${JSON.stringify(volume)}`);
    callback(null, null);
  }

  public close(): void {
    this.closes += 1;
  }
}
