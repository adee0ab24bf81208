import { Router } from 'express';
import { CallControlError } from '../errors';
import type { ContactStore } from '../contacts/types';
import { ContactInputSchema, ContactPatchSchema, toContactDto } from '../contacts/types';
import { asyncRoute } from './asyncRoute';
import { parseBody } from './calls';

export function createContactRouter(contacts: ContactStore): Router {
  const router = Router();

  router.get(
    '/',
    asyncRoute(async (_req, res) => {
      const all = await contacts.list();
      res.status(200).json({ success: true, contacts: all.map(toContactDto) });
    }),
  );

  router.post(
    '/',
    asyncRoute(async (req, res) => {
      const input = parseBody(ContactInputSchema, req.body);
      const contact = await contacts.create(input);
      res.status(201).json({ success: true, contact: toContactDto(contact) });
    }),
  );

  router.get(
    '/:id',
    asyncRoute(async (req, res) => {
      const contact = await contacts.get(req.params.id);
      if (!contact) {
        throw new CallControlError('NotFound', 'contact not found', { contact_id: req.params.id });
      }
      res.status(200).json({ success: true, contact: toContactDto(contact) });
    }),
  );

  router.put(
    '/:id',
    asyncRoute(async (req, res) => {
      const patch = parseBody(ContactPatchSchema, req.body);
      const contact = await contacts.update(req.params.id, patch);
      res.status(200).json({ success: true, contact: toContactDto(contact) });
    }),
  );

  router.delete(
    '/:id',
    asyncRoute(async (req, res) => {
      await contacts.delete(req.params.id);
      res.status(200).json({ success: true });
    }),
  );

  return router;
}
