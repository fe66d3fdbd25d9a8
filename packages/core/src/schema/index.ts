export { tasks } from './tasks.js';
export { categories } from './categories.js';
export { config } from './config.js';
