import 'dotenv/config'
import { fileURLToPath } from 'node:url'
import { migrate } from 'drizzle-orm/node-postgres/migrator'
import { closeDb, db } from '../src/db/client.js'

/**
 * Applies the SQL migrations drizzle-kit generated from src/db/schema.ts
 * (`npm run db:generate`). Already-applied migrations are skipped.
 */
const migrationsFolder = fileURLToPath(new URL('../drizzle', import.meta.url))

async function run() {
  try {
    await migrate(db, { migrationsFolder })
    console.log('Database migrations applied successfully.')
  } finally {
    await closeDb()
  }
}

run().catch((error: unknown) => {
  console.error('Migration failed:', error)
  process.exitCode = 1
})
