import { createTool } from '../base.js';
import { renderUser } from '../../render/index.js';

export const getUserInfoTool = createTool({
  name: 'get_user_info',
  description: "Get current user's profile information",
  category: 'user',
  parameters: {},
  execute: async (_args, context) => renderUser(await context.client.getCurrentUser()),
});
