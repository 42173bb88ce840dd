export { createAPIServer } from './server';
