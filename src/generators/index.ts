import { registerGenerator, generatorRegistry } from './registry.js';
import { ContactsGenerator } from './contacts.js';
import { CalendarGenerator } from './calendar.js';
import { SmsGenerator } from './sms.js';
import { EmailsGenerator } from './emails.js';
import { RemindersGenerator } from './reminders.js';
import { NotesGenerator } from './notes.js';
import { WalletGenerator } from './wallet.js';
import { AlarmsGenerator } from './alarms.js';

const BUILT_IN = [
  ['contacts', ContactsGenerator],
  ['calendar', CalendarGenerator],
  ['sms', SmsGenerator],
  ['emails', EmailsGenerator],
  ['reminders', RemindersGenerator],
  ['notes', NotesGenerator],
  ['wallet', WalletGenerator],
  ['alarms', AlarmsGenerator],
] as const;

for (const [appName, ctor] of BUILT_IN) {
  if (!generatorRegistry.has(appName)) {
    registerGenerator(appName, ctor);
  }
}

export { generatorRegistry, registerGenerator, GeneratorFactory, GeneratorRegistry } from './registry.js';
export type { GeneratorDescription } from './registry.js';
export type { AppGenerator, GenerationRequest, GeneratorContext, GeneratorConstructor } from './types.js';
export { BaseGenerator } from './base.js';
export {
  ContactsGenerator,
  CalendarGenerator,
  SmsGenerator,
  EmailsGenerator,
  RemindersGenerator,
  NotesGenerator,
  WalletGenerator,
  AlarmsGenerator,
};
export { getAlarmTemplates } from './alarms.js';
