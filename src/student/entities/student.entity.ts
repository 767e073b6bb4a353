// src/student/entities/student.entity.ts
import { Entity, Column, PrimaryGeneratedColumn, OneToMany } from 'typeorm';
import { Grade } from '../../grades/entity/grade.entity';

@Entity('students')
export class Student {
  @PrimaryGeneratedColumn({ type: 'integer' })
  id!: number;

  @Column({ name: 'full_name', type: 'text' })
  fullName!: string;

  @Column({ name: 'birth_year', type: 'integer' })
  birthYear!: number;

  @OneToMany(() => Grade, (grade) => grade.student)
  grades?: Grade[];
}
