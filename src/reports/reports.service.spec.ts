import { DataSource } from 'typeorm';
import { createTestDataSource } from '../../test/utils/test-data-source';
import { ConfigService } from '../config/config.service';
import { SeedService } from '../seed/seed.service';
import { Student } from '../student/entities/student.entity';
import { Grade } from '../grades/entity/grade.entity';
import { ReportsService } from './reports.service';

describe('ReportsService', () => {
  let dataSource: DataSource;
  let service: ReportsService;

  const seed = (data?: Parameters<SeedService['seed']>[0]) =>
    new SeedService(dataSource, new ConfigService('missing.env')).seed(data);

  beforeEach(async () => {
    dataSource = await createTestDataSource();
    service = new ReportsService(dataSource.getRepository(Student), dataSource.getRepository(Grade));
  });

  afterEach(async () => {
    await dataSource.destroy();
  });

  describe('with the classroom dataset', () => {
    beforeEach(async () => {
      await seed();
    });

    it('lists the grades of a student matched by full name', async () => {
      const rows = await service.gradesForStudent('Alice Johnson');

      expect(rows).toHaveLength(3);
      expect(rows).toEqual(
        expect.arrayContaining([
          { subject: 'Math', grade: 88 },
          { subject: 'English', grade: 92 },
          { subject: 'Science', grade: 85 },
        ]),
      );
    });

    it('matches the name exactly', async () => {
      expect(await service.gradesForStudent('alice johnson')).toEqual([]);
      expect(await service.gradesForStudent('Alice')).toEqual([]);
    });

    it('averages grades per student', async () => {
      const rows = await service.averageGradePerStudent();

      expect(rows).toHaveLength(9);
      const alice = rows.find((row) => row.studentId === 1);
      expect(alice?.fullName).toBe('Alice Johnson');
      expect(alice?.averageGrade).toBeCloseTo(88.3333, 3);
      const brian = rows.find((row) => row.studentId === 2);
      expect(brian?.averageGrade).toBeCloseTo(79, 5);
    });

    it('lists students born strictly after 2004', async () => {
      const rows = await service.studentsBornAfter(2004);
      const names = rows.map((row) => row.fullName);

      expect(names).toEqual([
        'Alice Johnson',
        'Carla Reyes',
        'Daniel Kim',
        'Felix Nguyen',
        'Grace Patel',
        'Isabella Martinez',
      ]);
      expect(names).not.toContain('Brian Smith');
      expect(rows.every((row) => row.birthYear > 2004)).toBe(true);
    });

    it('averages grades per subject', async () => {
      const rows = await service.averageGradePerSubject();
      const bySubject = new Map(rows.map((row) => [row.subject, row.averageSubjectGrade]));

      expect(rows).toHaveLength(6);
      expect(bySubject.get('Math')).toBeCloseTo(766 / 9, 5);
      expect(bySubject.get('English')).toBeCloseTo(87.6, 5);
      expect(bySubject.get('Science')).toBeCloseTo(84.5, 5);
      expect(bySubject.get('History')).toBeCloseTo(245 / 3, 5);
      expect(bySubject.get('Art')).toBeCloseTo(275 / 3, 5);
      expect(bySubject.get('Physical Education')).toBe(93);
    });

    it('ranks the top three students by average grade', async () => {
      const rows = await service.topStudentsByAverage(3);

      expect(rows.map((row) => row.fullName)).toEqual([
        'Isabella Martinez',
        'Carla Reyes',
        'Grace Patel',
      ]);
      expect(rows[0].averageGrade).toBeCloseTo(277 / 3, 5);
      expect(rows[1].averageGrade).toBeCloseTo(275 / 3, 5);
      expect(rows[2].averageGrade).toBeCloseTo(271 / 3, 5);

      const everyone = await service.averageGradePerStudent();
      const best = Math.max(...everyone.map((row) => row.averageGrade ?? 0));
      expect(rows[0].averageGrade).toBe(best);
    });

    it('lists each student with a grade below 80 once', async () => {
      const rows = await service.studentsWithGradeBelow(80);

      expect(rows).toEqual([
        { studentId: 2, fullName: 'Brian Smith' },
        { studentId: 6, fullName: 'Felix Nguyen' },
        { studentId: 8, fullName: 'Henry Lopez' },
      ]);
    });

    it('runs the whole catalog with default parameters', async () => {
      const report = await service.runAll();

      expect(report.gradesForStudent.fullName).toBe('Alice Johnson');
      expect(report.gradesForStudent.rows).toHaveLength(3);
      expect(report.averageGradePerStudent).toHaveLength(9);
      expect(report.studentsBornAfter).toMatchObject({ year: 2004 });
      expect(report.studentsBornAfter.rows).toHaveLength(6);
      expect(report.averageGradePerSubject).toHaveLength(6);
      expect(report.topStudents.limit).toBe(3);
      expect(report.topStudents.rows.map((row) => row.studentId)).toEqual([9, 3, 7]);
      expect(report.studentsBelowThreshold.threshold).toBe(80);
      expect(report.studentsBelowThreshold.rows.map((row) => row.studentId)).toEqual([2, 6, 8]);
    });
  });

  it('breaks ties on the average by student id', async () => {
    await seed({
      students: [
        { fullName: 'First Tie', birthYear: 2005 },
        { fullName: 'Second Tie', birthYear: 2005 },
        { fullName: 'Leader', birthYear: 2005 },
      ],
      grades: [
        { studentIndex: 1, subject: 'Math', grade: 85 },
        { studentIndex: 1, subject: 'Art', grade: 95 },
        { studentIndex: 0, subject: 'Math', grade: 90 },
        { studentIndex: 2, subject: 'Math', grade: 95 },
      ],
    });

    const rows = await service.topStudentsByAverage(3);

    expect(rows.map((row) => row.fullName)).toEqual(['Leader', 'First Tie', 'Second Tie']);
  });

  it('leaves students without grades out of the averages', async () => {
    await seed({
      students: [
        { fullName: 'Graded', birthYear: 2005 },
        { fullName: 'Ungraded', birthYear: 2006 },
      ],
      grades: [{ studentIndex: 0, subject: 'Math', grade: 70 }],
    });

    expect(await service.averageGradePerStudent()).toEqual([
      { studentId: 1, fullName: 'Graded', averageGrade: 70 },
    ]);
    expect(await service.topStudentsByAverage(3)).toHaveLength(1);
  });
});
