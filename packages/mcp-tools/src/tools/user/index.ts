export { getUserInfoTool } from './get-user-info.js';
