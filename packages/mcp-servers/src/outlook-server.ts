#!/usr/bin/env node
/**
 * Outlook MCP Server
 *
 * Usage:
 *   npm start
 */

import { main } from './base-server.js';

void main();
