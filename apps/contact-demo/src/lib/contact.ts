import { type Decoder, struct, text } from '@ipld-lite/cbor';
import { Cid } from '@ipld-lite/ipld';

export interface Contact {
  name: string;
  details: Cid;
}

export const SAMPLE_CONTACT: Contact = {
  name: 'Hello World!',
  details: new Cid([7, 8, 9]),
};

export const contactDecoder: Decoder<Contact> = struct('Contact', (fields) => ({
  name: fields.required('name', text),
  details: fields.required('details', Cid.decoder),
}));

export function formatContact(contact: Contact): string {
  return `Contact { name: ${JSON.stringify(contact.name)}, details: ${contact.details.toString()} }`;
}
