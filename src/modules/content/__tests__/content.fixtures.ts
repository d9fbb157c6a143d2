import { Project } from '../../../database/entities/project.entity';
import { ClubEvent } from '../../../database/entities/club-event.entity';
import { Announcement, AnnouncementType } from '../../../database/entities/announcement.entity';
import { buildDepartment } from '../../members/__tests__/member.fixtures';

export function buildProject(overrides: Partial<Project> = {}): Project {
  return Object.assign(new Project(), {
    id: 'project-1',
    title: 'Attendance Tracker',
    slug: 'attendance-tracker',
    description: 'QR based attendance for club meetings',
    imageUrl: null,
    githubUrl: 'https://git.example.com/club/attendance',
    liveUrl: '',
    departmentId: 'dept-software',
    department: buildDepartment(),
    createdById: null,
    createdBy: null,
    featured: true,
    createdAt: new Date('2025-02-01T10:00:00Z'),
    updatedAt: new Date('2025-02-01T10:00:00Z'),
    ...overrides,
  });
}

export function buildEvent(overrides: Partial<ClubEvent> = {}): ClubEvent {
  return Object.assign(new ClubEvent(), {
    id: 'event-1',
    title: 'Intro to Git',
    description: 'Hands-on session for new members',
    eventDate: new Date('2025-03-14T14:00:00Z'),
    location: 'Lab 3',
    departmentId: null,
    department: null,
    imageUrl: null,
    createdAt: new Date('2025-03-01T08:00:00Z'),
    updatedAt: new Date('2025-03-01T08:00:00Z'),
    ...overrides,
  });
}

export function buildAnnouncement(overrides: Partial<Announcement> = {}): Announcement {
  return Object.assign(new Announcement(), {
    id: 'announcement-1',
    title: 'Elections',
    content: 'Nominations close on Friday.',
    type: AnnouncementType.GENERAL,
    departmentId: null,
    department: null,
    createdById: null,
    createdBy: null,
    published: true,
    createdAt: new Date('2025-03-02T08:00:00Z'),
    updatedAt: new Date('2025-03-02T08:00:00Z'),
    ...overrides,
  });
}
