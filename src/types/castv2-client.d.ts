// castv2-client ships no type declarations and has no @types package.
// Only the surface the bridge calls is declared; status payloads stay
// `unknown` and are narrowed by the status parsers.
declare module 'castv2-client' {
  import { EventEmitter } from 'node:events';

  type Callback<T> = (error: Error | null, result: T) => void;

  export interface ReceiverSession {
    appId: string;
    sessionId: string;
    transportId: string;
    displayName?: string;
    namespaces?: Array<{ name: string }>;
  }

  export interface ConnectOptions {
    host: string;
    port?: number;
  }

  export class Controller extends EventEmitter {
    close(): void;
  }

  export class JsonController extends Controller {
    constructor(client: unknown, sourceId: string, destinationId: string, namespace: string);
    send(data: unknown): void;
  }

  export class RequestResponseController extends JsonController {
    request(data: Record<string, unknown>, callback: Callback<unknown>): void;
  }

  export class ReceiverController extends RequestResponseController {
    getStatus(callback: Callback<unknown>): void;
    getSessions(callback: Callback<ReceiverSession[]>): void;
    launch(appId: string, callback: Callback<ReceiverSession[]>): void;
    stop(sessionId: string, callback: Callback<ReceiverSession[]>): void;
    setVolume(options: { level?: number; muted?: boolean }, callback: Callback<unknown>): void;
    getVolume(callback: Callback<unknown>): void;
  }

  export class MediaController extends RequestResponseController {
    getStatus(callback: Callback<unknown>): void;
    sessionRequest(data: Record<string, unknown>, callback: Callback<unknown>): void;
  }

  export class Client extends EventEmitter {
    receiver: ReceiverController;
    connect(options: string | ConnectOptions, callback: () => void): void;
    close(): void;
    getStatus(callback: Callback<unknown>): void;
    getSessions(callback: Callback<ReceiverSession[]>): void;
    join<T extends Application>(
      session: ReceiverSession,
      application: new (client: unknown, session: ReceiverSession) => T,
      callback: Callback<T>,
    ): void;
    launch<T extends Application>(
      application: (new (client: unknown, session: ReceiverSession) => T) & { APP_ID: string },
      callback: Callback<T>,
    ): void;
    setVolume(volume: { level?: number; muted?: boolean }, callback: Callback<unknown>): void;
  }

  export class Application extends EventEmitter {
    static APP_ID: string;
    constructor(client: unknown, session: ReceiverSession);
    session: ReceiverSession;
    createController<T extends Controller>(
      controller: new (client: unknown, sourceId: string, destinationId: string, ...args: string[]) => T,
      ...args: string[]
    ): T;
    close(): void;
  }

  export interface LoadOptions {
    autoplay?: boolean;
    currentTime?: number;
  }

  export interface MediaInformation {
    contentId: string;
    contentType: string;
    streamType: 'BUFFERED' | 'LIVE' | 'NONE';
    metadata?: Record<string, unknown>;
  }

  export class DefaultMediaReceiver extends Application {
    static APP_ID: string;
    media: MediaController;
    getStatus(callback: Callback<unknown>): void;
    load(media: MediaInformation, options: LoadOptions, callback: Callback<unknown>): void;
    play(callback: Callback<unknown>): void;
    pause(callback: Callback<unknown>): void;
    stop(callback: Callback<unknown>): void;
    seek(currentTime: number, callback: Callback<unknown>): void;
  }
}
