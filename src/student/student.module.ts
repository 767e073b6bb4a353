import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { StudentsService } from './student.service';
import { Student } from './entities/student.entity';
import { Grade } from '../grades/entity/grade.entity';
import { StudentController } from './student.controller';

@Module({
  imports: [TypeOrmModule.forFeature([Student, Grade])],
  providers: [StudentsService],
  controllers: [StudentController],
  exports: [StudentsService],
})
export class StudentsModule {}
