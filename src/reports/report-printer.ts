import { ClassroomExerciseReport } from './dto/report-dtos';

export function printReport(report: ClassroomExerciseReport, print: (line: string) => void = console.log) {
  const section = (title: string, rows: object[]) => {
    print(`\n${title}`);
    if (rows.length === 0) {
      print('  (no rows)');
      return;
    }
    for (const row of rows) print(`  ${JSON.stringify(row)}`);
  };

  section(`3. Grades for ${report.gradesForStudent.fullName}`, report.gradesForStudent.rows);
  section('4. Average grade per student', report.averageGradePerStudent);
  section(`5. Students born after ${report.studentsBornAfter.year}`, report.studentsBornAfter.rows);
  section('6. Average grade per subject', report.averageGradePerSubject);
  section(`7. Top ${report.topStudents.limit} students by average grade`, report.topStudents.rows);
  section(
    `8. Students with a grade below ${report.studentsBelowThreshold.threshold}`,
    report.studentsBelowThreshold.rows,
  );
}
