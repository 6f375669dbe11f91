/**
 * Test Setup for Monitor Tests
 */

// Keep tests independent of the developer's shell
process.env.NODE_ENV = "test";
delete process.env.MONITOR_API_KEY;
delete process.env.REDIS_URL;
delete process.env.PORT;

export const TEST_API_KEY = "test-secret";
