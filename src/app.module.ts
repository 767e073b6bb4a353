import { Module } from '@nestjs/common';
import { ConfigModule } from './config/config.module';
import { DatabaseModule } from './database/database.module';
import { StudentsModule } from './student/student.module';
import { GradeModule } from './grades/grade.module';
import { ReportsModule } from './reports/reports.module';
import { SeedModule } from './seed/seed.module';
import { SystemModule } from './system/system.module';

@Module({
  imports: [
    ConfigModule,
    DatabaseModule,
    StudentsModule,
    GradeModule,
    ReportsModule,
    SeedModule,
    SystemModule,
  ],
})
export class AppModule {}
