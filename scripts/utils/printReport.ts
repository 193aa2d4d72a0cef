/**
 * Colored terminal rendering of an AnalysisReport
 */

import chalk from 'chalk';
import type { AnalysisReport } from '@mathlineage/shared';

const RULE = '-'.repeat(70);

const pct = (share: number): string => `${(share * 100).toFixed(2)}%`;

export const printReport = (report: AnalysisReport): void => {
  const { connectivity } = report;

  console.log(`\n${chalk.bold(`TOP ${report.topAdvisors.length} ADVISORS WITH MOST STUDENTS IN ${report.country.toUpperCase()}`)}`);
  console.log(RULE);
  report.topAdvisors.forEach(({ id, name, students }) => {
    console.log(`${chalk.hex('#DEADED').bold(name.padEnd(40))} ${chalk.blue(`${id}`.padStart(7))} - ${`${students}`.padStart(3)} students`);
  });

  console.log(`\n${chalk.bold(`TOP ${report.topUniversities.length} UNIVERSITIES`)}`);
  console.log(RULE);
  report.topUniversities.forEach(({ name, doctorates }) => {
    console.log(`${name.padEnd(50)} - ${`${doctorates}`.padStart(3)} doctorates`);
  });

  console.log(`\n${chalk.bold('MOST DESCENDANTS (within the fetched graph)')}`);
  console.log(RULE);
  report.topDescendants.forEach(({ id, name, descendants }) => {
    console.log(`${chalk.hex('#DEADED').bold(name.padEnd(40))} ${chalk.blue(`${id}`.padStart(7))} - ${`${descendants}`.padStart(4)} descendants`);
  });

  if (report.mostReportedDescendants) {
    const { name, reportedDescendantCount } = report.mostReportedDescendants;
    console.log(`\nMost descendants reported by MGP: ${chalk.bold(name)} (${reportedDescendantCount})`);
  }

  console.log(`\n${chalk.bold('GRAPH STRUCTURE')}`);
  console.log(RULE);
  console.log(`Vertices: ${connectivity.vertexCount}, edges: ${connectivity.edgeCount}`);
  console.log(`Isolated (no advisor and no students recorded): ${connectivity.isolatedCount}`);
  console.log(`Without advisees according to MGP: ${report.withoutAdviseesCount}`);
  console.log(`Connected components: ${connectivity.componentCount}`);
  if (connectivity.vertexCount === 0) {
    console.log(chalk.yellow('Empty graph, no vertices found'));
    return;
  }
  console.log(`Largest component: ${connectivity.giantComponentSize} vertices (${pct(connectivity.giantComponentShare)})`);
  console.log(connectivity.isGiant
    ? chalk.green('YES, it is a giant component (> 50% of vertices)')
    : chalk.yellow('NO, it is not a giant component (<= 50% of vertices)'));
  connectivity.topComponentSizes.forEach((size, i) => {
    console.log(`  ${i + 1}. ${size} vertices (${pct(size / connectivity.vertexCount)})`);
  });
};

export default printReport;
