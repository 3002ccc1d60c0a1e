export { WorkspaceManager } from './WorkspaceManager';
