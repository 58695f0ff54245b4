/**
 * Optional start/close hooks for anything whose lifetime is bound to a session.
 */
export interface RuntimeResource {
  start?(): Promise<void>;
  close?(): Promise<void>;
}
