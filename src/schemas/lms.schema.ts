import { z } from "zod";

/* ------------------ Canvas REST payloads ------------------ */

export const CanvasCourseSchema = z.object({
  id: z.number(),
  name: z.string().optional(),
  course_code: z.string().optional(),
});

export const CanvasUpcomingEventSchema = z.object({
  id: z.union([z.number(), z.string()]),
  title: z.string(),
  type: z.string().optional(),
  context_name: z.string().optional(),
  html_url: z.string().optional(),
  assignment: z
    .object({
      id: z.number(),
      name: z.string(),
      due_at: z.string().nullish(),
      points_possible: z.number().nullish(),
      html_url: z.string().optional(),
      course_id: z.number().optional(),
    })
    .optional(),
});

export const CanvasAnnouncementSchema = z.object({
  id: z.number(),
  title: z.string(),
  posted_at: z.string().nullish(),
  message: z.string().nullish(),
  context_code: z.string().optional(),
});

export const CanvasEnrollmentSchema = z.object({
  course_id: z.number(),
  type: z.string().optional(),
  grades: z
    .object({
      current_score: z.number().nullish(),
      current_grade: z.string().nullish(),
    })
    .optional(),
});

export const CanvasCourseListSchema = z.array(CanvasCourseSchema);
export const CanvasUpcomingEventListSchema = z.array(CanvasUpcomingEventSchema);
export const CanvasAnnouncementListSchema = z.array(CanvasAnnouncementSchema);
export const CanvasEnrollmentListSchema = z.array(CanvasEnrollmentSchema);
