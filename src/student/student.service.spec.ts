import { NotFoundException } from '@nestjs/common';
import { Test, TestingModule } from '@nestjs/testing';
import { getRepositoryToken } from '@nestjs/typeorm';
import { DataSource } from 'typeorm';
import { StudentsService } from './student.service';
import { Student } from './entities/student.entity';
import { Grade } from '../grades/entity/grade.entity';
import { ConfigService } from '../config/config.service';
import { SeedService } from '../seed/seed.service';
import { createTestDataSource } from '../../test/utils/test-data-source';

describe('StudentsService', () => {
  let service: StudentsService;
  const studentRepository = {
    create: jest.fn().mockImplementation((data: Partial<Student>) => ({ ...data })),
    save: jest.fn().mockImplementation(async (student: Partial<Student>) => ({ id: 10, ...student })),
    findOne: jest.fn(),
    delete: jest.fn().mockResolvedValue({ affected: 1 }),
  };
  const gradeRepository = {
    find: jest.fn().mockResolvedValue([]),
  };

  beforeEach(async () => {
    jest.clearAllMocks();
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        StudentsService,
        { provide: getRepositoryToken(Student), useValue: studentRepository },
        { provide: getRepositoryToken(Grade), useValue: gradeRepository },
      ],
    }).compile();

    service = module.get<StudentsService>(StudentsService);
  });

  it('creates a student from the dto', async () => {
    const created = await service.createStudent({ fullName: 'Test Student', birthYear: 2005 });

    expect(studentRepository.create).toHaveBeenCalledWith({ fullName: 'Test Student', birthYear: 2005 });
    expect(created).toEqual({ id: 10, fullName: 'Test Student', birthYear: 2005 });
  });

  it('throws NotFoundException for an unknown id', async () => {
    studentRepository.findOne.mockResolvedValueOnce(null);

    await expect(service.findOne(99)).rejects.toBeInstanceOf(NotFoundException);
  });

  it('does not look up grades of an unknown student', async () => {
    studentRepository.findOne.mockResolvedValueOnce(null);

    await expect(service.findGrades(99)).rejects.toBeInstanceOf(NotFoundException);
    expect(gradeRepository.find).not.toHaveBeenCalled();
  });

  it('applies only the provided fields on update', async () => {
    studentRepository.findOne.mockResolvedValueOnce({ id: 2, fullName: 'Brian Smith', birthYear: 2004 });

    const updated = await service.update(2, { birthYear: 2003 });

    expect(updated).toEqual({ id: 2, fullName: 'Brian Smith', birthYear: 2003 });
  });

  it('deletes an existing student by id', async () => {
    studentRepository.findOne.mockResolvedValueOnce({ id: 3, fullName: 'Carla Reyes', birthYear: 2006 });

    const result = await service.remove(3);

    expect(studentRepository.delete).toHaveBeenCalledWith({ id: 3 });
    expect(result).toEqual({ deleted: true, id: 3 });
  });

  describe('findAll against the seeded classroom', () => {
    let dataSource: DataSource;
    let seeded: StudentsService;

    beforeAll(async () => {
      dataSource = await createTestDataSource();
      await new SeedService(dataSource, new ConfigService('missing.env')).seed();
      seeded = new StudentsService(dataSource.getRepository(Student), dataSource.getRepository(Grade));
    });

    afterAll(async () => {
      await dataSource.destroy();
    });

    it('lists every student by id when no filter is given', async () => {
      const students = await seeded.findAll();

      expect(students.map((s) => s.id)).toEqual([1, 2, 3, 4, 5, 6, 7, 8, 9]);
    });

    it('matches a name substring regardless of case', async () => {
      const students = await seeded.findAll({ search: 'SMITH' });

      expect(students.map((s) => s.fullName)).toEqual(['Brian Smith']);
    });

    it('treats LIKE wildcards in the search literally', async () => {
      expect(await seeded.findAll({ search: '%' })).toEqual([]);
      expect(await seeded.findAll({ search: '_' })).toEqual([]);
    });

    it('combines the name and birth year filters', async () => {
      const students = await seeded.findAll({ search: 'e', bornAfter: 2005 });

      expect(students.map((s) => s.fullName)).toEqual(['Carla Reyes', 'Felix Nguyen', 'Isabella Martinez']);
    });
  });
});
