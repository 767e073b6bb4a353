import { Controller, Get, Param, Query } from '@nestjs/common';
import { ApiOperation, ApiTags } from '@nestjs/swagger';
import { ReportsService } from './reports.service';
import {
  BornAfterQueryDto,
  DEFAULT_BIRTH_YEAR_CUTOFF,
  DEFAULT_GRADE_THRESHOLD,
  DEFAULT_TOP_STUDENTS_LIMIT,
  GradeThresholdQueryDto,
  TopStudentsQueryDto,
} from './dto/report-dtos';

@ApiTags('Reports')
@Controller('reports')
export class ReportsController {
  constructor(private readonly reportsService: ReportsService) {}

  @Get('students/born-after')
  @ApiOperation({ summary: 'Students born strictly after a year (default 2004)' })
  studentsBornAfter(@Query() query: BornAfterQueryDto) {
    return this.reportsService.studentsBornAfter(query.year ?? DEFAULT_BIRTH_YEAR_CUTOFF);
  }

  @Get('students/below')
  @ApiOperation({ summary: 'Students with at least one grade below a threshold (default 80)' })
  studentsBelow(@Query() query: GradeThresholdQueryDto) {
    return this.reportsService.studentsWithGradeBelow(query.threshold ?? DEFAULT_GRADE_THRESHOLD);
  }

  @Get('students/:fullName/grades')
  @ApiOperation({ summary: 'Grades for a student, matched on exact full name' })
  gradesForStudent(@Param('fullName') fullName: string) {
    return this.reportsService.gradesForStudent(fullName);
  }

  @Get('averages/students')
  averageGradePerStudent() {
    return this.reportsService.averageGradePerStudent();
  }

  @Get('averages/subjects')
  averageGradePerSubject() {
    return this.reportsService.averageGradePerSubject();
  }

  @Get('top-students')
  @ApiOperation({ summary: 'Top students by average grade (default 3)' })
  topStudents(@Query() query: TopStudentsQueryDto) {
    return this.reportsService.topStudentsByAverage(query.limit ?? DEFAULT_TOP_STUDENTS_LIMIT);
  }

  @Get('exercise')
  @ApiOperation({ summary: 'Run the whole query catalog with its default parameters' })
  runAll() {
    return this.reportsService.runAll();
  }
}
