import {
  BootstrapResult,
  MemberBootstrapService,
} from '../modules/members/services/member-bootstrap.service';

export interface CreateMemberArgs {
  email?: string;
  password?: string;
  'reg-number'?: string;
  'full-name'?: string;
  dept?: string;
  admin?: boolean;
  'leader-of'?: string;
}

export interface PromoteMemberArgs {
  email?: string;
  admin?: boolean;
  'leader-of'?: string;
}

const CREATE_REQUIRED = ['email', 'password', 'reg-number', 'full-name', 'dept'] as const;

export async function createMember(
  bootstrap: MemberBootstrapService,
  args: CreateMemberArgs,
): Promise<BootstrapResult> {
  const missing = CREATE_REQUIRED.filter((flag) => !args[flag]);
  if (missing.length > 0) {
    throw new Error(`Missing required flags: ${missing.map((flag) => `--${flag}`).join(', ')}`);
  }

  return bootstrap.createMember({
    email: args.email ?? '',
    password: args.password ?? '',
    regNumber: args['reg-number'] ?? '',
    fullName: args['full-name'] ?? '',
    departmentName: args.dept ?? '',
    admin: args.admin === true,
    leaderOf: args['leader-of'],
  });
}

export async function promoteMember(
  bootstrap: MemberBootstrapService,
  args: PromoteMemberArgs,
): Promise<BootstrapResult> {
  if (!args.email) {
    throw new Error('Missing required flags: --email');
  }
  return bootstrap.promoteMember(args.email, {
    admin: args.admin === true,
    leaderOf: args['leader-of'],
  });
}

export function describeBootstrapResult({ member, ledDepartment }: BootstrapResult): string[] {
  const lines = [`✅ ${member.email} (${member.regNumber}, ID: ${member.id})`];
  if (member.isSystemAdmin) {
    lines.push('  → system admin');
  }
  if (ledDepartment) {
    lines.push(`  → leader of ${ledDepartment.name}`);
  }
  return lines;
}
