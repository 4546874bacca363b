#!/usr/bin/env node
// Entry point for the kinematics MCP server
export * from './schema/kinematics.js';
export * from './engine/kinematics/index.js';

// Import the server to start it
import './server/index.js';
