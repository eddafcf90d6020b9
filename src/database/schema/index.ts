export * from './appointments.js';
