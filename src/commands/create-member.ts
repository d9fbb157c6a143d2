#!/usr/bin/env ts-node
/**
 * Create an approved member, optionally as system admin or department leader.
 *
 * Usage:
 *   npm run cli:create-member -- --email admin@example.com --password 'Str0ng!Pass' \
 *     --reg-number T/STF/2025/001 --full-name "Club Admin" --dept Programming --admin
 *   npm run cli:create-member -- ... --leader-of Cybersecurity
 */
import 'reflect-metadata';
import { parseArgs } from 'node:util';
import { DataCommandModule } from './command.module';
import { createMember, describeBootstrapResult } from './member-commands';
import { runCommand } from './run-command';
import { MemberBootstrapService } from '../modules/members/services/member-bootstrap.service';

const { values } = parseArgs({
  options: {
    email: { type: 'string' },
    password: { type: 'string' },
    'reg-number': { type: 'string' },
    'full-name': { type: 'string' },
    dept: { type: 'string' },
    admin: { type: 'boolean' },
    'leader-of': { type: 'string' },
  },
});

void runCommand(DataCommandModule, async (app) => {
  const result = await createMember(app.get(MemberBootstrapService), values);

  for (const line of describeBootstrapResult(result)) {
    console.log(line);
  }
  return 0;
});
