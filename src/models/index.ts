// ── Barrel Export for all models ──
export { User, type IUser } from './User.js';
export { Contact, type IContact } from './Contact.js';
export { RefreshToken, type IRefreshToken } from './RefreshToken.js';
export { EmailLog, type IEmailLog } from './EmailLog.js';
