import { Injectable, Logger, NotFoundException } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { FindOptionsWhere, Repository } from 'typeorm';
import { Grade } from './entity/grade.entity';
import { CreateGradeDto, GradeQueryDto } from './dtos/grade.dto';

@Injectable()
export class GradeService {
  private readonly logger = new Logger(GradeService.name);

  constructor(
    @InjectRepository(Grade)
    private readonly gradeRepository: Repository<Grade>,
  ) {}

  // An unknown studentId is rejected by the foreign key; the error propagates unchanged.
  async createGrade(createGradeDto: CreateGradeDto): Promise<Grade> {
    this.logger.log(
      `Recording ${createGradeDto.subject}=${createGradeDto.grade} for student ${createGradeDto.studentId}`,
    );
    const grade = this.gradeRepository.create({
      studentId: createGradeDto.studentId,
      subject: createGradeDto.subject,
      grade: createGradeDto.grade,
    });
    return this.gradeRepository.save(grade);
  }

  async findAll(query: GradeQueryDto = {}): Promise<Grade[]> {
    const where: FindOptionsWhere<Grade> = {};
    if (query.studentId !== undefined) where.studentId = query.studentId;
    if (query.subject) where.subject = query.subject;
    return this.gradeRepository.find({ where, order: { id: 'ASC' } });
  }

  async findOne(id: number): Promise<Grade> {
    const grade = await this.gradeRepository.findOne({ where: { id } });
    if (!grade) {
      throw new NotFoundException(`Grade with ID ${id} not found`);
    }
    return grade;
  }

  async remove(id: number): Promise<{ deleted: true; id: number }> {
    const grade = await this.findOne(id);
    await this.gradeRepository.delete({ id: grade.id });
    return { deleted: true, id };
  }
}
