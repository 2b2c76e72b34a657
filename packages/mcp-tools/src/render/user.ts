import type { GraphUser } from '@outlook-connector/integrations';

export function renderUser(user: GraphUser): string {
  return (
    '👤 **User Information**\n' +
    `   Name: ${user.displayName || 'N/A'}\n` +
    `   Email: ${user.mail || user.userPrincipalName || 'N/A'}\n` +
    `   Job Title: ${user.jobTitle || 'N/A'}\n` +
    `   Office: ${user.officeLocation || 'N/A'}\n` +
    `   Phone: ${user.businessPhones?.[0] || 'N/A'}`
  );
}
