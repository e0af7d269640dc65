/**
 * Jest Environment Setup
 * Runs before each test file loads its modules.
 */

process.env.NODE_ENV = 'test';
process.env.LOG_LEVEL = 'error';
delete process.env.LOG_FILE;
delete process.env.SNAKE_PUZZLE_RESOLVER_TRACE;
