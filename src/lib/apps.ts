export const APP_NAMES = [
  'contacts', 'calendar', 'sms', 'emails',
  'reminders', 'notes', 'wallet', 'alarms',
] as const;

export type AppName = (typeof APP_NAMES)[number];

/** Top-level array property each app's payload and schema use. */
export const APP_DATA_KEYS: Record<AppName, string> = {
  contacts: 'contacts',
  calendar: 'events',
  sms: 'conversations',
  emails: 'emails',
  reminders: 'reminders',
  notes: 'notes',
  wallet: 'passes',
  alarms: 'alarms',
};

export function isAppName(value: string): value is AppName {
  return (APP_NAMES as readonly string[]).includes(value);
}

/** Data key for an app; late-registered apps use their own name. */
export function dataKeyFor(appName: string): string {
  return isAppName(appName) ? APP_DATA_KEYS[appName] : appName;
}
