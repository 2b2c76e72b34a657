export { GetEmailsTool, getEmailsTool } from './get-emails.js';
