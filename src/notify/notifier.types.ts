export interface Notifier {
  /**
   * Plays the end-of-session cue. May throw or reject; callers isolate the
   * failure as a `NotificationWarning`.
   */
  play(): Promise<void>;
}

export class SilentNotifier implements Notifier {
  async play(): Promise<void> {
    return;
  }
}
