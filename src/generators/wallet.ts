import { BaseGenerator } from './base.js';
import { getTemplateBank } from '../lib/template-bank.js';
import type { JsonRecord } from '../agents/types.js';

export const PASS_TYPES = ['boarding_pass', 'event_ticket', 'store_card', 'membership', 'coupon'] as const;
export type PassType = (typeof PASS_TYPES)[number];

interface PassField {
  label: string;
  value: string;
  key: string;
}

export class WalletGenerator extends BaseGenerator {
  readonly appName = 'wallet';
  protected readonly idPrefix = 'pass';

  protected instructions(): string {
    return `
Please generate wallet passes data in the following JSON format:
{
    "passes": [
        {
            "id": "unique_identifier",
            "type": "boarding_pass|event_ticket|store_card|membership|coupon",
            "organization_name": "Organization",
            "pass_name": "Pass Name",
            "description": "Short description",
            "background_color": "#RRGGBB",
            "foreground_color": "#RRGGBB",
            "primary_fields": [{ "label": "Label", "value": "Value", "key": "key" }],
            "secondary_fields": [{ "label": "Label", "value": "Value", "key": "key" }],
            "barcode": { "format": "QR|PDF417|Aztec|Code128", "message": "Barcode payload", "message_encoding": "utf-8" },
            "created_date": "ISO timestamp",
            "voided": false
        }
    ]
}

Include boarding passes, event tickets, store cards, membership cards, and
coupons with appropriate metadata.
`;
  }

  protected synthesize(count: number): JsonRecord[] {
    const f = this.faker;
    const bank = getTemplateBank().wallet;

    return Array.from({ length: count }, () => {
      const type = f.helpers.arrayElement(PASS_TYPES);
      const label = type.split('_').map((w) => w[0].toUpperCase() + w.slice(1)).join(' ');

      return {
        id: this.nextId(),
        type,
        organization_name: f.helpers.arrayElement(bank.organizations[type] ?? ['Generic Company']),
        pass_name: bank.pass_names[type] ?? 'Generic Pass',
        description: `${label} pass`,
        background_color: f.color.rgb({ format: 'hex', casing: 'upper' }),
        foreground_color: '#FFFFFF',
        primary_fields: this.primaryFields(type),
        secondary_fields: this.secondaryFields(type),
        barcode: {
          format: 'QR',
          message: `PASS${f.number.int({ min: 100000, max: 999999 })}`,
          message_encoding: 'utf-8',
        },
        created_date: this.randomTimestamp(),
        voided: false,
      };
    });
  }

  private primaryFields(type: PassType): PassField[] {
    const f = this.faker;
    switch (type) {
      case 'boarding_pass':
        return [{ label: 'Flight', value: `AA${f.number.int({ min: 100, max: 999 })}`, key: 'flight' }];
      case 'event_ticket':
        return [{ label: 'Event', value: 'Concert', key: 'event' }];
      case 'store_card':
        return [{ label: 'Points', value: String(f.number.int({ min: 100, max: 5000 })), key: 'points' }];
      case 'membership':
        return [{ label: 'Member', value: 'Gold', key: 'level' }];
      case 'coupon':
        return [{ label: 'Discount', value: '20% OFF', key: 'discount' }];
    }
  }

  private secondaryFields(type: PassType): PassField[] {
    const f = this.faker;
    const windowYear = this.windowEnd.getUTCFullYear();
    switch (type) {
      case 'boarding_pass':
        return [{
          label: 'Gate',
          value: `${f.helpers.arrayElement(['A', 'B', 'C', 'D'])}${f.number.int({ min: 1, max: 30 })}`,
          key: 'gate',
        }];
      case 'event_ticket':
        return [{ label: 'Seat', value: `Row ${f.number.int({ min: 1, max: 20 })}`, key: 'seat' }];
      case 'store_card':
        return [{ label: 'Member Since', value: String(windowYear - f.number.int({ min: 1, max: 6 })), key: 'since' }];
      case 'membership':
        return [{ label: 'Expires', value: `${windowYear + 1}-12-31`, key: 'expires' }];
      case 'coupon':
        return [{ label: 'Expires', value: `${windowYear}-12-31`, key: 'expires' }];
    }
  }
}
