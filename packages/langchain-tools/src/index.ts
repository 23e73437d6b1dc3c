export { createNetworkTool, type NetworkToolParams } from './networkTool.js';
