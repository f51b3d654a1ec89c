// Global teardown - close the database pool after all tests
export default async function globalTeardown(): Promise<void> {
     const { closePool } = await import('./services/shared/src/db/client');
     await closePool();
}
