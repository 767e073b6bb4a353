// src/database/data-source.ts
import 'reflect-metadata';
import { DataSource } from 'typeorm';
import { ConfigService } from '../config/config.service';
import { buildDataSourceOptions } from './database.options';

// Standalone data source for scripts and the TypeORM CLI
export const AppDataSource = new DataSource(buildDataSourceOptions(new ConfigService()));

