import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { ReportsController } from './reports.controller';
import { ReportsService } from './reports.service';
import { Student } from '../student/entities/student.entity';
import { Grade } from '../grades/entity/grade.entity';

@Module({
  imports: [TypeOrmModule.forFeature([Student, Grade])],
  controllers: [ReportsController],
  providers: [ReportsService],
  exports: [ReportsService],
})
export class ReportsModule {}
