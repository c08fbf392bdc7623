import fs from 'fs/promises';
import path from 'path';

const CREATE_TABLE = /create table if not exists\s+(\w+)/gi;

async function main() {
  const migrationsDir = path.join(process.cwd(), 'src', 'db', 'migrations');
  const entries = await fs.readdir(migrationsDir);
  const sqlFiles = entries.filter((file) => file.endsWith('.sql')).sort();

  console.log('Trait extraction SQL migrations');
  console.log('-------------------------------');
  console.log('Run these files in your Supabase SQL editor in order, then `npm run migrate` to seed model configs:\n');

  const shouldPrint = process.argv.includes('--print');
  for (const [index, file] of sqlFiles.entries()) {
    const sql = await fs.readFile(path.join(migrationsDir, file), 'utf8');
    const tables = [...sql.matchAll(CREATE_TABLE)].map((match) => match[1]);
    console.log(`${index + 1}. ${file}${tables.length > 0 ? ` (${tables.join(', ')})` : ''}`);

    if (shouldPrint) {
      console.log(`\n--- ${file} ---\n`);
      console.log(sql);
    }
  }
}

main().catch((error) => {
  console.error('Failed to list migrations:', error);
  process.exit(1);
});
