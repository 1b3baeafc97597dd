export interface LmsCourse {
  id: number;
  name: string;
  code: string;
}

export interface LmsAssignment {
  id: number;
  title: string;
  courseId?: number;
  courseName?: string;
  dueAt?: string;
  pointsPossible?: number;
  url?: string;
}

export interface LmsAnnouncement {
  id: number;
  title: string;
  courseName?: string;
  postedAt?: string;
  message?: string;
}

export interface LmsGrade {
  courseId: number;
  courseName?: string;
  currentScore?: number;
  currentGrade?: string;
}

export type LmsSection = 'courses' | 'assignments' | 'announcements' | 'grades';

export interface LmsSummary {
  courses: LmsCourse[];
  assignments: LmsAssignment[];
  announcements: LmsAnnouncement[];
  grades: LmsGrade[];
  failedSections: LmsSection[];
}
