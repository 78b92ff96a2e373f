export type AlertContext = Record<string, unknown>;

/** Outbound notifications for operator-facing events such as fills. */
export interface AlertService {
  notify(title: string, message: string, context?: AlertContext): Promise<void>;
}
