export { SessionStore } from './store.js';
