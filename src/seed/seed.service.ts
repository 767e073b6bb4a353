import { Injectable, Logger, OnApplicationBootstrap } from '@nestjs/common';
import { InjectDataSource } from '@nestjs/typeorm';
import { DataSource, EntityManager } from 'typeorm';
import { ConfigService } from '../config/config.service';
import { Student } from '../student/entities/student.entity';
import { Grade } from '../grades/entity/grade.entity';
import classroomSeed from './data/classroom-seed.json';

export interface StudentSeedRow {
  fullName: string;
  birthYear: number;
}

export interface GradeSeedRow {
  studentId: number;
  subject: string;
  grade: number;
}

// A grade in the dataset points at its student by position in `students`.
export interface GradeSeedEntry {
  studentIndex: number;
  subject: string;
  grade: number;
}

export interface ClassroomSeed {
  students: StudentSeedRow[];
  grades: GradeSeedEntry[];
}

export interface SeedResult {
  seeded: boolean;
  students: number;
  grades: number;
}

export const CLASSROOM_SEED: ClassroomSeed = classroomSeed;

@Injectable()
export class SeedService implements OnApplicationBootstrap {
  private readonly logger = new Logger(SeedService.name);

  constructor(
    @InjectDataSource() private readonly dataSource: DataSource,
    private readonly configService: ConfigService,
  ) {}

  async onApplicationBootstrap(): Promise<void> {
    if (!this.configService.getBoolean('SEED_ON_BOOT', false)) return;

    // Seeding needs the schema even when DB_MIGRATIONS_RUN is off
    if (await this.dataSource.showMigrations()) {
      this.logger.log('Applying pending migrations before seeding');
      await this.dataSource.runMigrations({ transaction: 'each' });
    }
    await this.seed();
  }

  /**
   * Inserts the fixed classroom dataset in one transaction. Skipped when the
   * students table already holds rows, so running it twice is harmless.
   */
  async seed(data: ClassroomSeed = CLASSROOM_SEED): Promise<SeedResult> {
    const existing = await this.dataSource.getRepository(Student).count();
    if (existing > 0) {
      this.logger.log(`Students table already has ${existing} rows, skipping seed`);
      return { seeded: false, students: 0, grades: 0 };
    }

    const result = await this.dataSource.transaction(async (manager) => {
      const students = await this.seedStudents(manager, data.students);
      const grades = await this.seedGrades(manager, resolveGradeRows(students, data.grades));
      return { seeded: true, students: students.length, grades };
    });
    this.logger.log(`Seeded ${result.students} students and ${result.grades} grades`);
    return result;
  }

  // One insert per row keeps id assignment in listed order on every driver.
  async seedStudents(manager: EntityManager, rows: StudentSeedRow[]): Promise<Student[]> {
    const repo = manager.getRepository(Student);
    const saved: Student[] = [];
    for (const row of rows) {
      saved.push(await repo.save(repo.create({ fullName: row.fullName, birthYear: row.birthYear })));
    }
    return saved;
  }

  // Fails with the engine's foreign key violation when a referenced student is missing.
  async seedGrades(manager: EntityManager, rows: GradeSeedRow[]): Promise<number> {
    const repo = manager.getRepository(Grade);
    for (const row of rows) {
      await repo.save(repo.create({ studentId: row.studentId, subject: row.subject, grade: row.grade }));
    }
    return rows.length;
  }
}

/**
 * Maps dataset grades onto the ids the students were actually given, which
 * only match their listed order on a table whose id sequence never advanced.
 */
export function resolveGradeRows(students: Student[], entries: GradeSeedEntry[]): GradeSeedRow[] {
  return entries.map((entry) => {
    const index = entry.studentIndex;
    if (!Number.isInteger(index) || index < 0 || index >= students.length) {
      throw new Error(`Seed grade references unknown student position ${index}`);
    }
    return { studentId: students[index].id, subject: entry.subject, grade: entry.grade };
  });
}
