import { MigrationInterface, QueryRunner, Table } from 'typeorm';

export class CreateClassroomSchema1729000000000 implements MigrationInterface {
  name = 'CreateClassroomSchema1729000000000';

  public async up(queryRunner: QueryRunner): Promise<void> {
    if (!(await queryRunner.hasTable('students'))) {
      await queryRunner.createTable(
        new Table({
          name: 'students',
          columns: [
            {
              name: 'id',
              type: 'integer',
              isPrimary: true,
              isGenerated: true,
              generationStrategy: 'increment',
            },
            { name: 'full_name', type: 'text', isNullable: false },
            { name: 'birth_year', type: 'integer', isNullable: false },
          ],
        }),
        true,
      );
    }

    if (!(await queryRunner.hasTable('grades'))) {
      await queryRunner.createTable(
        new Table({
          name: 'grades',
          columns: [
            {
              name: 'id',
              type: 'integer',
              isPrimary: true,
              isGenerated: true,
              generationStrategy: 'increment',
            },
            { name: 'student_id', type: 'integer', isNullable: true },
            { name: 'subject', type: 'text', isNullable: true },
            { name: 'grade', type: 'integer', isNullable: true },
          ],
          foreignKeys: [
            {
              name: 'FK_grades_student',
              columnNames: ['student_id'],
              referencedTableName: 'students',
              referencedColumnNames: ['id'],
              onDelete: 'CASCADE',
              onUpdate: 'CASCADE',
            },
          ],
          indices: [
            {
              name: 'inx_grades_student',
              columnNames: ['student_id'],
            },
          ],
        }),
        true,
      );
    }
  }

  public async down(queryRunner: QueryRunner): Promise<void> {
    if (await queryRunner.hasTable('grades')) {
      await queryRunner.dropTable('grades', true, true, true);
    }
    if (await queryRunner.hasTable('students')) {
      await queryRunner.dropTable('students', true);
    }
  }
}
