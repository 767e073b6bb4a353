import { Entity, Column, PrimaryGeneratedColumn, ManyToOne, JoinColumn, Index } from 'typeorm';
import { Student } from '../../student/entities/student.entity';

// student_id, subject and grade are nullable at the schema level; the API requires them.
@Entity('grades')
@Index('inx_grades_student', ['studentId'])
export class Grade {
  @PrimaryGeneratedColumn({ type: 'integer' })
  id!: number;

  @Column({ name: 'student_id', type: 'integer', nullable: true })
  studentId!: number | null;

  @ManyToOne(() => Student, (student) => student.grades, {
    nullable: true,
    onDelete: 'CASCADE',
    onUpdate: 'CASCADE',
  })
  @JoinColumn({ name: 'student_id', foreignKeyConstraintName: 'FK_grades_student' })
  student?: Student | null;

  @Column({ type: 'text', nullable: true })
  subject!: string | null;

  @Column({ type: 'integer', nullable: true })
  grade!: number | null;
}
