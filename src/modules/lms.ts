import { AxiosInstance } from 'axios';
import { ZodType, ZodTypeDef } from 'zod';
import { FetchResult } from '../interfaces/fetchResult';
import {
  LmsAnnouncement,
  LmsAssignment,
  LmsCourse,
  LmsGrade,
  LmsSection,
  LmsSummary,
} from '../interfaces/lms';
import { LmsConfig } from '../schemas/config.schema';
import {
  CanvasAnnouncementListSchema,
  CanvasCourseListSchema,
  CanvasEnrollmentListSchema,
  CanvasUpcomingEventListSchema,
} from '../schemas/lms.schema';
import { attempt, fallback, success } from './fallback';
import { mockLmsSummary } from './mockData';
import { MissingCredentialError, SchemaMismatchError } from '../utils/errors';
import { logger } from '../logger';

const SOURCE = 'lms';
const MESSAGE_LENGTH = 200;

export interface LmsServiceDeps {
  axiosClient: AxiosInstance;
  config: LmsConfig;
}

function stripHtml(html: string | null | undefined): string | undefined {
  if (!html) return undefined;
  const text = html
    .replace(/<[^>]*>/g, ' ')
    .replace(/&nbsp;/g, ' ')
    .replace(/&amp;/g, '&')
    .replace(/\s+/g, ' ')
    .trim();
  if (!text) return undefined;
  return text.length > MESSAGE_LENGTH ? `${text.slice(0, MESSAGE_LENGTH)}...` : text;
}

function byDueDate(a: LmsAssignment, b: LmsAssignment): number {
  if (!a.dueAt && !b.dueAt) return 0;
  if (!a.dueAt) return 1;
  if (!b.dueAt) return -1;
  return Date.parse(a.dueAt) - Date.parse(b.dueAt);
}

/**
 * Canvas LMS fetcher. Only constructed when a base URL and API key are
 * configured; every sub-resource is fault-isolated.
 */
export class LmsService {
  constructor(private readonly deps: LmsServiceDeps) {}

  private async get<T>(
    path: string,
    schema: ZodType<T, ZodTypeDef, unknown>,
    params: Record<string, unknown> = {}
  ): Promise<T> {
    const { baseUrl, apiKey } = this.deps.config;
    if (!baseUrl || !apiKey) throw new MissingCredentialError('Canvas base URL / API key');

    const response = await this.deps.axiosClient.get(`${baseUrl.replace(/\/+$/, '')}/api/v1${path}`, {
      headers: { Authorization: `Bearer ${apiKey}` },
      params: { per_page: 50, ...params },
    });

    const parsed = schema.safeParse(response.data);
    if (!parsed.success) {
      throw new SchemaMismatchError(`Canvas ${path}`, parsed.error.issues);
    }
    return parsed.data;
  }

  async getCourses(): Promise<LmsCourse[]> {
    const courses = await this.get('/courses', CanvasCourseListSchema, { enrollment_state: 'active' });
    return courses
      .filter((c) => c.name)
      .map((c) => ({ id: c.id, name: c.name ?? '', code: c.course_code ?? '' }));
  }

  async getAssignments(courses: LmsCourse[]): Promise<LmsAssignment[]> {
    const events = await this.get('/users/self/upcoming_events', CanvasUpcomingEventListSchema);
    const courseNames = new Map(courses.map((c) => [c.id, c.name]));

    return events
      .filter((e) => e.assignment)
      .map((e) => {
        const a = e.assignment;
        const assignment: LmsAssignment = { id: a?.id ?? 0, title: a?.name ?? e.title };
        const courseName = (a?.course_id !== undefined ? courseNames.get(a.course_id) : undefined) ?? e.context_name;
        if (a?.course_id !== undefined) assignment.courseId = a.course_id;
        if (courseName) assignment.courseName = courseName;
        if (a?.due_at) assignment.dueAt = a.due_at;
        if (a?.points_possible !== undefined && a.points_possible !== null) {
          assignment.pointsPossible = a.points_possible;
        }
        const url = a?.html_url ?? e.html_url;
        if (url) assignment.url = url;
        return assignment;
      })
      .sort(byDueDate)
      .slice(0, this.deps.config.maxAssignments);
  }

  async getAnnouncements(courses: LmsCourse[]): Promise<LmsAnnouncement[]> {
    if (courses.length === 0) return [];

    const announcements = await this.get('/announcements', CanvasAnnouncementListSchema, {
      context_codes: courses.map((c) => `course_${c.id}`),
      active_only: true,
    });
    const courseNames = new Map(courses.map((c) => [`course_${c.id}`, c.name]));

    return announcements.slice(0, this.deps.config.maxAnnouncements).map((a) => {
      const item: LmsAnnouncement = { id: a.id, title: a.title };
      const courseName = a.context_code ? courseNames.get(a.context_code) : undefined;
      if (courseName) item.courseName = courseName;
      if (a.posted_at) item.postedAt = a.posted_at;
      const message = stripHtml(a.message);
      if (message) item.message = message;
      return item;
    });
  }

  async getGrades(courses: LmsCourse[]): Promise<LmsGrade[]> {
    const enrollments = await this.get('/users/self/enrollments', CanvasEnrollmentListSchema, {
      'state[]': 'active',
    });
    const courseNames = new Map(courses.map((c) => [c.id, c.name]));

    return enrollments
      .filter((e) => e.grades && (e.type === undefined || e.type === 'StudentEnrollment'))
      .map((e) => {
        const grade: LmsGrade = { courseId: e.course_id };
        const courseName = courseNames.get(e.course_id);
        if (courseName) grade.courseName = courseName;
        const score = e.grades?.current_score;
        if (score !== undefined && score !== null) grade.currentScore = score;
        const letter = e.grades?.current_grade;
        if (letter) grade.currentGrade = letter;
        return grade;
      });
  }

  async fetchSummary(now: Date = new Date()): Promise<FetchResult<LmsSummary>> {
    const failedSections: LmsSection[] = [];

    const courses = await attempt(SOURCE, 'courses', () => this.getCourses());
    if (!courses.ok) failedSections.push('courses');
    const courseList = courses.ok ? courses.value : [];

    const assignments = await attempt(SOURCE, 'assignments', () => this.getAssignments(courseList));
    if (!assignments.ok) failedSections.push('assignments');

    // announcements are scoped to courses, so they depend on the course list
    const announcements = courses.ok
      ? await attempt(SOURCE, 'announcements', () => this.getAnnouncements(courseList))
      : courses;
    if (!announcements.ok) failedSections.push('announcements');

    const grades = await attempt(SOURCE, 'grades', () => this.getGrades(courseList));
    if (!grades.ok) failedSections.push('grades');

    if (!courses.ok && !assignments.ok && !grades.ok) {
      return fallback(mockLmsSummary(now), courses.reason, 'all LMS sub-resources failed', now.getTime());
    }

    const summary: LmsSummary = {
      courses: courseList,
      assignments: assignments.ok ? assignments.value : [],
      announcements: announcements.ok ? announcements.value : [],
      grades: grades.ok ? grades.value : [],
      failedSections,
    };

    logger.info(
      { source: SOURCE, assignments: summary.assignments.length, failedSections },
      'LMS data fetched'
    );

    return success(summary, now.getTime());
  }
}
