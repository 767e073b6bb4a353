import { Type } from 'class-transformer';
import { IsInt, IsOptional, IsPositive, Max } from 'class-validator';

export const DEFAULT_STUDENT_NAME = 'Alice Johnson';
export const DEFAULT_BIRTH_YEAR_CUTOFF = 2004;
export const DEFAULT_TOP_STUDENTS_LIMIT = 3;
export const DEFAULT_GRADE_THRESHOLD = 80;

// #3
export interface StudentGradeItem {
  subject: string | null;
  grade: number | null;
}

// #4 and #7
export interface StudentAverageItem {
  studentId: number;
  fullName: string;
  averageGrade: number | null;
}

// #5
export interface StudentBirthYearItem {
  fullName: string;
  birthYear: number;
}

// #6
export interface SubjectAverageItem {
  subject: string | null;
  averageSubjectGrade: number | null;
}

// #8
export interface StudentRefItem {
  studentId: number;
  fullName: string;
}

export interface ClassroomExerciseReport {
  gradesForStudent: { fullName: string; rows: StudentGradeItem[] };
  averageGradePerStudent: StudentAverageItem[];
  studentsBornAfter: { year: number; rows: StudentBirthYearItem[] };
  averageGradePerSubject: SubjectAverageItem[];
  topStudents: { limit: number; rows: StudentAverageItem[] };
  studentsBelowThreshold: { threshold: number; rows: StudentRefItem[] };
}

export class BornAfterQueryDto {
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  year?: number;
}

export class TopStudentsQueryDto {
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @IsPositive()
  @Max(1000)
  limit?: number;
}

export class GradeThresholdQueryDto {
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  threshold?: number;
}
