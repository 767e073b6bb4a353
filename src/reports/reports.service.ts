import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { Student } from '../student/entities/student.entity';
import { Grade } from '../grades/entity/grade.entity';
import { toAverage } from '../common/utils/database.utils';
import {
  ClassroomExerciseReport,
  DEFAULT_BIRTH_YEAR_CUTOFF,
  DEFAULT_GRADE_THRESHOLD,
  DEFAULT_STUDENT_NAME,
  DEFAULT_TOP_STUDENTS_LIMIT,
  StudentAverageItem,
  StudentBirthYearItem,
  StudentGradeItem,
  StudentRefItem,
  SubjectAverageItem,
} from './dto/report-dtos';

interface RawStudentAverage {
  studentId: number | string;
  fullName: string;
  averageGrade: number | string | null;
}

interface RawSubjectAverage {
  subject: string | null;
  averageSubjectGrade: number | string | null;
}

/**
 * Read-only query catalog over the students/grades schema.
 *
 * Every aggregate uses inner-join semantics, so a student or subject with no
 * grades never appears in an average. Orderings not required by a query are
 * applied only to keep output stable between runs.
 */
@Injectable()
export class ReportsService {
  private readonly logger = new Logger(ReportsService.name);

  constructor(
    @InjectRepository(Student)
    private readonly studentRepository: Repository<Student>,
    @InjectRepository(Grade)
    private readonly gradeRepository: Repository<Grade>,
  ) {}

  /** #3: exact, case-sensitive match on full name. */
  async gradesForStudent(fullName: string): Promise<StudentGradeItem[]> {
    const rows = await this.gradeRepository
      .createQueryBuilder('grade')
      .innerJoin('grade.student', 'student')
      .select('grade.subject', 'subject')
      .addSelect('grade.grade', 'grade')
      .where('student.fullName = :fullName', { fullName })
      .orderBy('grade.id', 'ASC')
      .getRawMany<StudentGradeItem>();
    return rows.map((row) => ({
      subject: row.subject,
      grade: row.grade === null ? null : Number(row.grade),
    }));
  }

  /** #4 */
  async averageGradePerStudent(): Promise<StudentAverageItem[]> {
    const rows = await this.studentAveragesQuery()
      .orderBy('student.id', 'ASC')
      .getRawMany<RawStudentAverage>();
    return rows.map(toStudentAverage);
  }

  /** #5: strictly after `year`. */
  async studentsBornAfter(year: number = DEFAULT_BIRTH_YEAR_CUTOFF): Promise<StudentBirthYearItem[]> {
    const rows = await this.studentRepository
      .createQueryBuilder('student')
      .select('student.fullName', 'fullName')
      .addSelect('student.birthYear', 'birthYear')
      .where('student.birthYear > :year', { year })
      .orderBy('student.id', 'ASC')
      .getRawMany<StudentBirthYearItem>();
    return rows.map((row) => ({ fullName: row.fullName, birthYear: Number(row.birthYear) }));
  }

  /** #6 */
  async averageGradePerSubject(): Promise<SubjectAverageItem[]> {
    const rows = await this.gradeRepository
      .createQueryBuilder('grade')
      .select('grade.subject', 'subject')
      .addSelect('AVG(grade.grade)', 'averageSubjectGrade')
      .groupBy('grade.subject')
      .orderBy('grade.subject', 'ASC')
      .getRawMany<RawSubjectAverage>();
    return rows.map((row) => ({
      subject: row.subject,
      averageSubjectGrade: toAverage(row.averageSubjectGrade),
    }));
  }

  /** #7: ties on the average are broken by student id, lowest first. */
  async topStudentsByAverage(limit: number = DEFAULT_TOP_STUDENTS_LIMIT): Promise<StudentAverageItem[]> {
    const rows = await this.studentAveragesQuery()
      .orderBy('AVG(grade.grade)', 'DESC')
      .addOrderBy('student.id', 'ASC')
      .limit(limit)
      .getRawMany<RawStudentAverage>();
    return rows.map(toStudentAverage);
  }

  /** #8: one row per student, however many grades fall below the threshold. */
  async studentsWithGradeBelow(threshold: number = DEFAULT_GRADE_THRESHOLD): Promise<StudentRefItem[]> {
    const rows = await this.studentRepository
      .createQueryBuilder('student')
      .innerJoin('student.grades', 'grade')
      .select('student.id', 'studentId')
      .addSelect('student.fullName', 'fullName')
      .where('grade.grade < :threshold', { threshold })
      .groupBy('student.id')
      .addGroupBy('student.fullName')
      .orderBy('student.id', 'ASC')
      .getRawMany<{ studentId: number | string; fullName: string }>();
    return rows.map((row) => ({ studentId: Number(row.studentId), fullName: row.fullName }));
  }

  async runAll(): Promise<ClassroomExerciseReport> {
    this.logger.log('Running classroom query catalog');
    return {
      gradesForStudent: {
        fullName: DEFAULT_STUDENT_NAME,
        rows: await this.gradesForStudent(DEFAULT_STUDENT_NAME),
      },
      averageGradePerStudent: await this.averageGradePerStudent(),
      studentsBornAfter: {
        year: DEFAULT_BIRTH_YEAR_CUTOFF,
        rows: await this.studentsBornAfter(DEFAULT_BIRTH_YEAR_CUTOFF),
      },
      averageGradePerSubject: await this.averageGradePerSubject(),
      topStudents: {
        limit: DEFAULT_TOP_STUDENTS_LIMIT,
        rows: await this.topStudentsByAverage(DEFAULT_TOP_STUDENTS_LIMIT),
      },
      studentsBelowThreshold: {
        threshold: DEFAULT_GRADE_THRESHOLD,
        rows: await this.studentsWithGradeBelow(DEFAULT_GRADE_THRESHOLD),
      },
    };
  }

  private studentAveragesQuery() {
    return this.studentRepository
      .createQueryBuilder('student')
      .innerJoin('student.grades', 'grade')
      .select('student.id', 'studentId')
      .addSelect('student.fullName', 'fullName')
      .addSelect('AVG(grade.grade)', 'averageGrade')
      .groupBy('student.id')
      .addGroupBy('student.fullName');
  }
}

function toStudentAverage(row: RawStudentAverage): StudentAverageItem {
  return {
    studentId: Number(row.studentId),
    fullName: row.fullName,
    averageGrade: toAverage(row.averageGrade),
  };
}
