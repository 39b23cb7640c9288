// Keep the server from listening and the logger quiet during Vitest runs.
process.env.NODE_ENV = 'test';
