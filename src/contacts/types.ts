import { z } from 'zod';

export interface Contact {
  id: string;
  name: string;
  sipUri: string;
  phoneNumber: string | null;
  email: string | null;
  notes: string | null;
  createdAt: Date;
  updatedAt: Date;
}

export const ContactInputSchema = z.object({
  name: z.string().trim().min(1).max(100),
  sip_uri: z.string().trim().min(1).max(200),
  phone_number: z.string().trim().max(20).nullable().optional(),
  email: z.string().trim().email().max(100).nullable().optional(),
  notes: z.string().max(500).nullable().optional(),
});

export const ContactPatchSchema = ContactInputSchema.partial();

export type ContactInput = z.infer<typeof ContactInputSchema>;
export type ContactPatch = z.infer<typeof ContactPatchSchema>;

export interface ContactStore {
  list(): Promise<Contact[]>;
  get(id: string): Promise<Contact | null>;
  /** Fails Conflict when another contact already uses the SIP URI. */
  create(input: ContactInput): Promise<Contact>;
  update(id: string, patch: ContactPatch): Promise<Contact>;
  delete(id: string): Promise<void>;
}

export function applyContactPatch(contact: Contact, patch: ContactPatch, now: Date): Contact {
  return {
    ...contact,
    name: patch.name ?? contact.name,
    sipUri: patch.sip_uri ?? contact.sipUri,
    phoneNumber: patch.phone_number !== undefined ? patch.phone_number : contact.phoneNumber,
    email: patch.email !== undefined ? patch.email : contact.email,
    notes: patch.notes !== undefined ? patch.notes : contact.notes,
    updatedAt: now,
  };
}

export function newContact(id: string, input: ContactInput, now: Date): Contact {
  return {
    id,
    name: input.name,
    sipUri: input.sip_uri,
    phoneNumber: input.phone_number ?? null,
    email: input.email ?? null,
    notes: input.notes ?? null,
    createdAt: now,
    updatedAt: now,
  };
}

export function toContactDto(contact: Contact): Record<string, unknown> {
  return {
    id: contact.id,
    name: contact.name,
    sip_uri: contact.sipUri,
    phone_number: contact.phoneNumber,
    email: contact.email,
    notes: contact.notes,
    created_at: contact.createdAt.toISOString(),
    updated_at: contact.updatedAt.toISOString(),
  };
}

export function compareContactsByName(a: Contact, b: Contact): number {
  return a.name.localeCompare(b.name) || Number(a.id) - Number(b.id);
}
