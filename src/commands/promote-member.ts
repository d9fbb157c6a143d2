#!/usr/bin/env ts-node
/**
 * Grant an existing member system admin rights or a department to lead.
 *
 * Usage:
 *   npm run cli:promote-member -- --email jane@example.com --admin
 *   npm run cli:promote-member -- --email jane@example.com --leader-of Networking
 */
import 'reflect-metadata';
import { parseArgs } from 'node:util';
import { DataCommandModule } from './command.module';
import { describeBootstrapResult, promoteMember } from './member-commands';
import { runCommand } from './run-command';
import { MemberBootstrapService } from '../modules/members/services/member-bootstrap.service';

const { values } = parseArgs({
  options: {
    email: { type: 'string' },
    admin: { type: 'boolean' },
    'leader-of': { type: 'string' },
  },
});

void runCommand(DataCommandModule, async (app) => {
  const result = await promoteMember(app.get(MemberBootstrapService), values);

  for (const line of describeBootstrapResult(result)) {
    console.log(line);
  }
  return 0;
});
