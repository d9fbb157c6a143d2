#!/usr/bin/env ts-node
/**
 * Create the default departments and courses. Safe to run repeatedly.
 *
 * Usage:
 *   npm run cli:seed
 */
import 'reflect-metadata';
import { DataCommandModule } from './command.module';
import { runCommand } from './run-command';
import { DepartmentsService } from '../modules/departments/departments.service';

void runCommand(DataCommandModule, async (app) => {
  const summary = await app.get(DepartmentsService).seedReferenceData();

  console.log(`✅ Departments created: ${summary.departmentsCreated}, existing: ${summary.departmentsExisting}`);
  console.log(
    `✅ Courses created: ${summary.coursesCreated}, updated: ${summary.coursesUpdated}, existing: ${summary.coursesExisting}`,
  );
  return 0;
});
