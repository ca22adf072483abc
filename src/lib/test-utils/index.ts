export {
  initTestDatabase,
  getTestDatabase,
  closeTestDatabase,
  resetTestDatabase,
  testExecute,
  testSelect,
  countRows,
} from './test-database';
export { seedEmployee, seedDevice, seedScans } from './fixtures';
