import { Router } from 'express';
import * as contactsController from './contacts.controller.js';
import { authenticate } from '../../middleware/auth.js';
import { validate } from '../../middleware/validate.js';
import { createContactSchema, updateContactSchema } from './contacts.validation.js';

const router = Router();

router.use(authenticate);

/**
 * @openapi
 * /contacts:
 *   post:
 *     summary: Create a contact
 *     tags: [Contacts]
 *     security:
 *       - bearerAuth: []
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             $ref: '#/components/schemas/ContactInput'
 *     responses:
 *       201:
 *         description: Created contact
 *       409:
 *         description: Contact already exists
 *   get:
 *     summary: List or search contacts
 *     tags: [Contacts]
 *     security:
 *       - bearerAuth: []
 *     parameters:
 *       - in: query
 *         name: q
 *         description: Case-insensitive match on first name, last name or email
 *         schema: { type: string }
 *       - in: query
 *         name: skip
 *         schema: { type: integer, minimum: 0, default: 0 }
 *       - in: query
 *         name: limit
 *         schema: { type: integer, minimum: 1, maximum: 100, default: 100 }
 *     responses:
 *       200:
 *         description: Contacts ordered by last name, then first name
 */
router.post('/', validate(createContactSchema), contactsController.createContact);
router.get('/', contactsController.listContacts);

/**
 * @openapi
 * /contacts/birthdays/upcoming:
 *   get:
 *     summary: Contacts with a birthday in the next N days
 *     tags: [Contacts]
 *     security:
 *       - bearerAuth: []
 *     parameters:
 *       - in: query
 *         name: days
 *         schema: { type: integer, minimum: 0, maximum: 366, default: 7 }
 *     responses:
 *       200:
 *         description: Contacts, soonest birthday first
 */
router.get('/birthdays/upcoming', contactsController.upcomingBirthdays);

/**
 * @openapi
 * /contacts/{id}:
 *   get:
 *     summary: Get a contact
 *     tags: [Contacts]
 *     security:
 *       - bearerAuth: []
 *     responses:
 *       200:
 *         description: Contact
 *       404:
 *         description: Contact not found
 *   patch:
 *     summary: Update some fields of a contact (null clears an optional field)
 *     tags: [Contacts]
 *     security:
 *       - bearerAuth: []
 *     responses:
 *       200:
 *         description: Updated contact
 *       404:
 *         description: Contact not found
 *       409:
 *         description: Contact already exists
 *   delete:
 *     summary: Delete a contact
 *     tags: [Contacts]
 *     security:
 *       - bearerAuth: []
 *     responses:
 *       200:
 *         description: "{ ok: true }"
 *       404:
 *         description: Contact not found
 */
router.get('/:id', contactsController.getContact);
router.patch('/:id', validate(updateContactSchema), contactsController.updateContact);
router.delete('/:id', contactsController.deleteContact);

export default router;
