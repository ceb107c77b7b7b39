import { BaseGenerator } from './base.js';
import { toDateString } from './base.js';
import type { JsonRecord } from '../agents/types.js';

export const CONTACT_RELATIONSHIPS = ['friend', 'colleague', 'family', 'acquaintance', 'business'] as const;
export type ContactRelationship = (typeof CONTACT_RELATIONSHIPS)[number];

const RELATIONSHIP_WEIGHTS: Array<{ value: ContactRelationship; weight: number }> = [
  { value: 'friend', weight: 40 },
  { value: 'colleague', weight: 30 },
  { value: 'family', weight: 15 },
  { value: 'acquaintance', weight: 10 },
  { value: 'business', weight: 5 },
];

export class ContactsGenerator extends BaseGenerator {
  readonly appName = 'contacts';
  protected readonly idPrefix = 'contact';

  protected instructions(): string {
    return `
Please generate contacts data in the following JSON format:
{
    "contacts": [
        {
            "id": "unique_identifier",
            "first_name": "string",
            "last_name": "string",
            "display_name": "string",
            "phone_numbers": [{ "label": "mobile|home|work|main|other", "number": "+1234567890" }],
            "email_addresses": [{ "label": "home|work|other", "email": "email@example.com" }],
            "addresses": [{
                "label": "home|work|other",
                "street": "123 Main St",
                "city": "City",
                "state": "State",
                "postal_code": "12345",
                "country": "Country"
            }],
            "organization": "Company Name",
            "job_title": "Job Title",
            "birthday": "YYYY-MM-DD",
            "notes": "Additional notes",
            "relationship": "family|friend|colleague|acquaintance|business|other",
            "created_date": "ISO timestamp"
        }
    ]
}

Include diverse relationship types and ensure contacts relate to the events and user profile.
Mix of complete and partial contact information to be realistic.
Include family, friends, colleagues, and professional contacts as appropriate.
`;
  }

  protected synthesize(count: number): JsonRecord[] {
    const f = this.faker;
    return Array.from({ length: count }, () => {
      const relationship = f.helpers.weightedArrayElement(RELATIONSHIP_WEIGHTS);
      const firstName = f.person.firstName();
      const lastName = f.person.lastName();
      const professional = relationship === 'colleague' || relationship === 'business';
      const close = relationship === 'friend' || relationship === 'family';

      const phoneNumbers = [{ label: 'mobile', number: f.phone.number({ style: 'international' }) }];
      if (relationship === 'colleague' && f.datatype.boolean({ probability: 0.5 })) {
        phoneNumbers.push({ label: 'work', number: f.phone.number({ style: 'international' }) });
      }

      const addresses = close && f.datatype.boolean({ probability: 0.3 })
        ? [{
            label: 'home',
            street: f.location.streetAddress(),
            city: f.location.city(),
            state: f.location.state(),
            postal_code: f.location.zipCode(),
            country: 'United States',
          }]
        : [];

      return {
        id: this.nextId(),
        first_name: firstName,
        last_name: lastName,
        display_name: `${firstName} ${lastName}`,
        phone_numbers: phoneNumbers,
        email_addresses: [{
          label: close ? 'home' : 'work',
          email: f.internet.email({ firstName, lastName }).toLowerCase(),
        }],
        addresses,
        organization: professional ? f.company.name() : '',
        job_title: professional ? f.person.jobTitle() : '',
        birthday: toDateString(f.date.birthdate({ mode: 'age', min: 18, max: 80, refDate: this.windowEnd })),
        notes: '',
        relationship,
        created_date: this.randomTimestamp(),
      };
    });
  }
}
