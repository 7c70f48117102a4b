import SchemaRepository, { COLUMN_MIGRATIONS, type ColumnMigration } from '../SchemaRepository';

jest.mock('../../utils/logger', () => ({
  info: jest.fn(),
  error: jest.fn(),
  warn: jest.fn(),
  debug: jest.fn(),
}));

const createDb = () => ({
  none: jest.fn().mockResolvedValue(null),
  any: jest.fn().mockResolvedValue([]),
});

const MIGRATIONS: ColumnMigration[] = [
  { id: '001_path_velocity', table: 'path', column: 'velocity', definition: 'DOUBLE PRECISION' },
  { id: '002_aircraft_stale_cpr_count', table: 'aircraft', column: 'stale_cpr_count', definition: 'INTEGER' },
];

describe('SchemaRepository', () => {
  it('adds only the columns that are missing', async () => {
    const db = createDb();
    db.any
      .mockResolvedValueOnce([{ column_name: 'velocity' }])
      .mockResolvedValueOnce([]);
    const schema = new SchemaRepository(db, MIGRATIONS);

    await expect(schema.applyMigrations()).resolves.toEqual(['002_aircraft_stale_cpr_count']);

    expect(db.any).toHaveBeenNthCalledWith(1, expect.stringContaining('information_schema.columns'), ['path', 'velocity']);
    expect(db.none).toHaveBeenCalledTimes(1);
    expect(db.none).toHaveBeenCalledWith(
      'ALTER TABLE $1:name ADD COLUMN IF NOT EXISTS $2:name INTEGER',
      ['aircraft', 'stale_cpr_count'],
    );
  });

  it('applies nothing when every column exists', async () => {
    const db = createDb();
    db.any.mockResolvedValue([{ column_name: 'present' }]);

    await expect(new SchemaRepository(db).applyMigrations()).resolves.toEqual([]);
    expect(db.any).toHaveBeenCalledTimes(COLUMN_MIGRATIONS.length);
    expect(db.none).not.toHaveBeenCalled();
  });

  it('creates tables, then migrates, then indexes', async () => {
    const db = createDb();
    const schema = new SchemaRepository(db, MIGRATIONS);

    await schema.initialize();

    const statements: string[] = db.none.mock.calls.map((call: unknown[]) => String(call[0]));
    expect(statements).toHaveLength(4);
    expect(statements[0]).toContain('CREATE TABLE IF NOT EXISTS flight_session');
    expect(statements[1]).toContain('ALTER TABLE');
    expect(statements[2]).toContain('ALTER TABLE');
    expect(statements[3]).toContain('CREATE INDEX IF NOT EXISTS idx_path_session_ts');
  });

  it('keeps migration ids unique', () => {
    const ids = COLUMN_MIGRATIONS.map((migration) => migration.id);
    expect(new Set(ids).size).toBe(ids.length);
  });
});
