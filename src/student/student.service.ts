import { Injectable, NotFoundException, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { Student } from './entities/student.entity';
import { Grade } from '../grades/entity/grade.entity';
import { CreateStudentDto } from './dto/create-student.dto';
import { UpdateStudentDto } from './dto/update-student.dto';
import { StudentQueryDto } from './dto/student-query.dto';
import { escapeLikePattern } from '../common/utils/database.utils';

@Injectable()
export class StudentsService {
  private readonly logger = new Logger(StudentsService.name);

  constructor(
    @InjectRepository(Student)
    private readonly studentRepository: Repository<Student>,
    @InjectRepository(Grade)
    private readonly gradeRepository: Repository<Grade>,
  ) {}

  async createStudent(createStudentDto: CreateStudentDto): Promise<Student> {
    this.logger.log(`Creating student: ${createStudentDto.fullName}`);
    const student = this.studentRepository.create({
      fullName: createStudentDto.fullName,
      birthYear: createStudentDto.birthYear,
    });
    const saved = await this.studentRepository.save(student);
    this.logger.log(`Created student with ID: ${saved.id}`);
    return saved;
  }

  // Name search is a case-insensitive substring match on both engines
  async findAll(query: StudentQueryDto = {}): Promise<Student[]> {
    const qb = this.studentRepository.createQueryBuilder('student').orderBy('student.id', 'ASC');
    if (query.search) {
      qb.andWhere("LOWER(student.fullName) LIKE :pattern ESCAPE '\\'", {
        pattern: `%${escapeLikePattern(query.search.toLowerCase())}%`,
      });
    }
    if (query.bornAfter !== undefined) {
      qb.andWhere('student.birthYear > :bornAfter', { bornAfter: query.bornAfter });
    }
    return qb.getMany();
  }

  async findOne(id: number): Promise<Student> {
    const student = await this.studentRepository.findOne({ where: { id } });
    if (!student) {
      throw new NotFoundException(`Student with ID ${id} not found`);
    }
    return student;
  }

  async findGrades(id: number): Promise<Grade[]> {
    await this.findOne(id);
    return this.gradeRepository.find({ where: { studentId: id }, order: { id: 'ASC' } });
  }

  async update(id: number, updateStudentDto: UpdateStudentDto): Promise<Student> {
    const student = await this.findOne(id);
    if (updateStudentDto.fullName !== undefined) student.fullName = updateStudentDto.fullName;
    if (updateStudentDto.birthYear !== undefined) student.birthYear = updateStudentDto.birthYear;
    return this.studentRepository.save(student);
  }

  // Dependent grades are removed by the ON DELETE CASCADE constraint
  async remove(id: number): Promise<{ deleted: true; id: number }> {
    const student = await this.findOne(id);
    await this.studentRepository.delete({ id: student.id });
    this.logger.log(`Deleted student with ID: ${id}`);
    return { deleted: true, id };
  }
}
