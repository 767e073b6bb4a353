import { Injectable } from '@nestjs/common';
import { DataSource } from 'typeorm';
import { InjectDataSource } from '@nestjs/typeorm';
import { Student } from '../student/entities/student.entity';
import { Grade } from '../grades/entity/grade.entity';

export interface HealthStatus {
  status: 'ok';
  database: 'up' | 'down';
  message?: string;
  timestamp: string;
}

export interface ClassroomOverview {
  uptimeSeconds: number;
  students: number;
  grades: number;
  generatedAt: string;
}

@Injectable()
export class SystemService {
  private readonly startTime = Date.now();

  constructor(@InjectDataSource() private readonly dataSource: DataSource) {}

  // The web server is up if this responds; the database is probed separately.
  async getHealth(): Promise<HealthStatus> {
    const timestamp = new Date().toISOString();
    try {
      await this.dataSource.query('SELECT 1');
      return { status: 'ok', database: 'up', timestamp };
    } catch (e) {
      return {
        status: 'ok',
        database: 'down',
        message: e instanceof Error ? e.message : String(e),
        timestamp,
      };
    }
  }

  async getOverview(): Promise<ClassroomOverview> {
    const [students, grades] = await Promise.all([
      this.dataSource.getRepository(Student).count(),
      this.dataSource.getRepository(Grade).count(),
    ]);
    return {
      uptimeSeconds: Math.floor((Date.now() - this.startTime) / 1000),
      students,
      grades,
      generatedAt: new Date().toISOString(),
    };
  }
}
