export interface Notifier {
  /** Channel name used in logs. */
  readonly name: string
  send(message: string): Promise<void>
}
