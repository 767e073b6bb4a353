import 'reflect-metadata';
// Runs the classroom exercise end to end: create schema, seed, then every catalog query.
import { AppDataSource } from '../database/data-source';
import { ConfigService } from '../config/config.service';
import { Student } from '../student/entities/student.entity';
import { Grade } from '../grades/entity/grade.entity';
import { SeedService } from '../seed/seed.service';
import { ReportsService } from '../reports/reports.service';
import { printReport } from '../reports/report-printer';

async function main() {
  console.log('Initializing data source...');
  await AppDataSource.initialize();
  try {
    const migrations = await AppDataSource.runMigrations();
    console.log(`Applied ${migrations.length} migration(s)`);

    const seedResult = await new SeedService(AppDataSource, new ConfigService()).seed();
    console.log(
      seedResult.seeded
        ? `Seeded ${seedResult.students} students and ${seedResult.grades} grades`
        : 'Data already present, seed skipped',
    );

    const reports = new ReportsService(
      AppDataSource.getRepository(Student),
      AppDataSource.getRepository(Grade),
    );
    printReport(await reports.runAll());
  } finally {
    await AppDataSource.destroy();
  }
}

main().catch((err: unknown) => {
  console.error('Classroom exercise failed:', err);
  process.exit(1);
});
