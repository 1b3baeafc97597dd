import { AxiosInstance } from 'axios';
import { LmsService } from '@/modules/lms';
import { LmsConfigSchema } from '@/schemas/config.schema';

const NOW = new Date('2024-03-13T12:00:00Z');
const BASE = 'https://canvas.test/api/v1';

const payloads: Record<string, unknown> = {
  [`${BASE}/courses`]: [
    { id: 1, name: 'Biology', course_code: 'BIO101' },
    { id: 2, course_code: 'RESTRICTED' },
  ],
  [`${BASE}/users/self/upcoming_events`]: [
    {
      id: 'assignment_10',
      title: 'Lab Report',
      assignment: {
        id: 10,
        name: 'Lab Report',
        due_at: '2024-03-20T23:59:00Z',
        points_possible: 20,
        course_id: 1,
        html_url: 'https://canvas.test/courses/1/assignments/10',
      },
    },
    {
      id: 'assignment_11',
      title: 'Quiz',
      context_name: 'Biology (Spring)',
      assignment: { id: 11, name: 'Quiz', due_at: '2024-03-15T12:00:00Z', course_id: 1 },
    },
    { id: 'calendar_event_5', title: 'Office hours' },
  ],
  [`${BASE}/announcements`]: [
    {
      id: 7,
      title: 'Exam moved',
      posted_at: '2024-03-12T10:00:00Z',
      message: '<p>The exam is now on Friday.</p><p>Bring a pencil.</p>',
      context_code: 'course_1',
    },
  ],
  [`${BASE}/users/self/enrollments`]: [
    { course_id: 1, type: 'StudentEnrollment', grades: { current_score: 91.5, current_grade: 'A-' } },
    { course_id: 3, type: 'TeacherEnrollment', grades: {} },
  ],
};

const createAxiosClient = (get: jest.Mock): AxiosInstance => ({ get } as unknown as AxiosInstance);

function canvas(failing: string[] = [], error: unknown = { code: 'ERR_BAD_RESPONSE', response: { status: 500 } }) {
  return jest.fn((url: string) =>
    failing.some((path) => url === `${BASE}${path}`) ? Promise.reject(error) : Promise.resolve({ data: payloads[url] })
  );
}

function makeService(get: jest.Mock) {
  return new LmsService({
    axiosClient: createAxiosClient(get),
    config: LmsConfigSchema.parse({ baseUrl: 'https://canvas.test/', apiKey: 'test-token' }),
  });
}

describe('LmsService.fetchSummary (unit)', () => {
  /**
   * Purpose:
   * Verifies Core behavior:
   * - every sub-resource is fetched with the bearer token
   * - assignments are ordered by due date
   * - announcements are scoped to the active courses
   */
  it('collects courses, assignments, announcements and grades', async () => {
    const get = canvas();

    const result = await makeService(get).fetchSummary(NOW);

    expect(result.status).toBe('success');
    expect(result.data).toEqual({
      courses: [{ id: 1, name: 'Biology', code: 'BIO101' }],
      assignments: [
        { id: 11, title: 'Quiz', courseId: 1, courseName: 'Biology', dueAt: '2024-03-15T12:00:00Z' },
        {
          id: 10,
          title: 'Lab Report',
          courseId: 1,
          courseName: 'Biology',
          dueAt: '2024-03-20T23:59:00Z',
          pointsPossible: 20,
          url: 'https://canvas.test/courses/1/assignments/10',
        },
      ],
      announcements: [
        {
          id: 7,
          title: 'Exam moved',
          courseName: 'Biology',
          postedAt: '2024-03-12T10:00:00Z',
          message: 'The exam is now on Friday. Bring a pencil.',
        },
      ],
      grades: [{ courseId: 1, courseName: 'Biology', currentScore: 91.5, currentGrade: 'A-' }],
      failedSections: [],
    });
    expect(get).toHaveBeenCalledWith(`${BASE}/announcements`, {
      headers: { Authorization: 'Bearer test-token' },
      params: { per_page: 50, context_codes: ['course_1'], active_only: true },
    });
  });

  /**
   * Purpose:
   * Verifies Fault isolation:
   * - a failed course list also skips announcements
   * - the other sub-resources still succeed
   */
  it('keeps the remaining sections when courses fail', async () => {
    const get = canvas(['/courses']);

    const result = await makeService(get).fetchSummary(NOW);

    expect(result.status).toBe('success');
    expect(result.data.failedSections).toEqual(['courses', 'announcements']);
    expect(result.data.assignments.map((a) => a.courseName)).toEqual(['Biology (Spring)', undefined]);
    expect(result.data.grades).toEqual([{ courseId: 1, currentScore: 91.5, currentGrade: 'A-' }]);
    expect(get).not.toHaveBeenCalledWith(`${BASE}/announcements`, expect.anything());
  });

  it('falls back to mock coursework when every sub-resource fails', async () => {
    const get = canvas(
      ['/courses', '/users/self/upcoming_events', '/users/self/enrollments'],
      { code: 'ERR_BAD_REQUEST', response: { status: 401 } }
    );

    const result = await makeService(get).fetchSummary(NOW);

    expect(result).toMatchObject({
      status: 'fallback',
      reason: 'auth_error',
      detail: 'all LMS sub-resources failed',
    });
    expect(result.data.assignments.map((a) => a.title)).toEqual(['Reading Response', 'Problem Set']);
  });

  it('treats an unexpected payload as a failed section', async () => {
    const get = jest.fn((url: string) =>
      Promise.resolve({ data: url.endsWith('/enrollments') ? { error: 'nope' } : payloads[url] })
    );

    const result = await makeService(get).fetchSummary(NOW);

    expect(result.status).toBe('success');
    expect(result.data.failedSections).toEqual(['grades']);
  });
});
