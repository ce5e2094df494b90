export interface Contact {
  id: number;
  full_name: string;
  phone_number: string;
}

export type NewContact = Omit<Contact, 'id'>;

export type ContactField = keyof NewContact;
