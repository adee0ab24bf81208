import { CallControlError } from '../errors';
import {
  applyContactPatch,
  compareContactsByName,
  newContact,
  type Contact,
  type ContactInput,
  type ContactPatch,
  type ContactStore,
} from './types';

export class MemoryContactStore implements ContactStore {
  private readonly contacts = new Map<string, Contact>();
  private sequence = 0;

  constructor(private readonly clock: () => Date = () => new Date()) {}

  public async list(): Promise<Contact[]> {
    return [...this.contacts.values()].sort(compareContactsByName).map((contact) => ({ ...contact }));
  }

  public async get(id: string): Promise<Contact | null> {
    const contact = this.contacts.get(id);
    return contact ? { ...contact } : null;
  }

  public async create(input: ContactInput): Promise<Contact> {
    this.assertUriFree(input.sip_uri);
    this.sequence += 1;
    const contact = newContact(String(this.sequence), input, this.clock());
    this.contacts.set(contact.id, contact);
    return { ...contact };
  }

  public async update(id: string, patch: ContactPatch): Promise<Contact> {
    const existing = this.contacts.get(id);
    if (!existing) {
      throw new CallControlError('NotFound', `contact ${id} not found`);
    }
    if (patch.sip_uri !== undefined && patch.sip_uri !== existing.sipUri) {
      this.assertUriFree(patch.sip_uri);
    }
    const updated = applyContactPatch(existing, patch, this.clock());
    this.contacts.set(id, updated);
    return { ...updated };
  }

  public async delete(id: string): Promise<void> {
    if (!this.contacts.delete(id)) {
      throw new CallControlError('NotFound', `contact ${id} not found`);
    }
  }

  private assertUriFree(sipUri: string): void {
    for (const contact of this.contacts.values()) {
      if (contact.sipUri === sipUri) {
        throw new CallControlError('Conflict', 'contact already exists', { sip_uri: sipUri });
      }
    }
  }
}
