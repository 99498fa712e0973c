import {z} from 'zod'
import type {CapabilityRegistry} from '../core/registry.js'
import type {Course, CourseDataSource} from './course-data.js'

const DAY_MS = 24 * 60 * 60 * 1000

const courseIdInput = z
  .object({
    course_id: z.string().min(1).describe('Course id, as returned by list_courses')
  })
  .strict()

const windowInput = (direction: string) =>
  z
    .object({
      days: z.number().int().positive().max(365).default(7).describe(`Number of days to ${direction} (default: 7)`)
    })
    .strict()

type CourseToolOptions = {
  now?: () => Date
}

function courseLabel(course: Course): string {
  return course.courseCode ?? course.name
}

async function requireCourse(source: CourseDataSource, courseId: string): Promise<Course> {
  const course = (await source.listCourses()).find((item) => item.id === courseId)
  if (!course) throw new Error(`Course not found: ${courseId}`)
  return course
}

async function courseNames(source: CourseDataSource): Promise<Map<string, string>> {
  return new Map((await source.listCourses()).map((course) => [course.id, courseLabel(course)]))
}

export function registerCourseTools(
  registry: CapabilityRegistry,
  source: CourseDataSource,
  options: CourseToolOptions = {}
): void {
  const now = options.now ?? (() => new Date())

  registry.register({
    name: 'list_courses',
    description:
      'List the courses the student is enrolled in, with id, name, course code and term. Call this first when a course id is needed.',
    input: z.object({}).strict(),
    execute: async () =>
      (await source.listCourses()).map((course) => ({
        id: course.id,
        name: course.name,
        courseCode: course.courseCode ?? null,
        term: course.term ?? null
      }))
  })

  registry.register({
    name: 'get_assignments',
    description:
      'List every assignment of one course with due date, points possible, submission status, and score or grade when graded.',
    input: courseIdInput,
    execute: async ({course_id}) => {
      await requireCourse(source, course_id)
      return (await source.listAssignments(course_id)).map((assignment) => ({
        id: assignment.id,
        name: assignment.name,
        dueAt: assignment.dueAt,
        pointsPossible: assignment.pointsPossible,
        submitted: assignment.submitted,
        score: assignment.score,
        grade: assignment.grade
      }))
    }
  })

  registry.register({
    name: 'get_upcoming_assignments',
    description:
      'List assignments due within the next N days across all courses, soonest first, including the course each belongs to.',
    input: windowInput('look ahead'),
    execute: async ({days}) => {
      const from = now().getTime()
      const until = from + days * DAY_MS
      const names = await courseNames(source)
      return (await source.listAssignments())
        .filter((assignment) => {
          if (!assignment.dueAt) return false
          const due = Date.parse(assignment.dueAt)
          return due >= from && due <= until
        })
        .sort((a, b) => Date.parse(a.dueAt ?? '') - Date.parse(b.dueAt ?? ''))
        .map((assignment) => ({
          id: assignment.id,
          name: assignment.name,
          courseId: assignment.courseId,
          course: names.get(assignment.courseId) ?? assignment.courseId,
          dueAt: assignment.dueAt,
          pointsPossible: assignment.pointsPossible,
          submitted: assignment.submitted
        }))
    }
  })

  registry.register({
    name: 'get_grades',
    description: 'Get current and final grade and score for one course.',
    input: courseIdInput,
    execute: async ({course_id}) => {
      const course = await requireCourse(source, course_id)
      return {
        courseId: course.id,
        course: courseLabel(course),
        currentGrade: course.currentGrade,
        currentScore: course.currentScore,
        finalGrade: course.finalGrade,
        finalScore: course.finalScore
      }
    }
  })

  registry.register({
    name: 'get_announcements',
    description: 'List announcements posted in the last N days across all courses, newest first.',
    input: windowInput('look back'),
    execute: async ({days}) => {
      const until = now().getTime()
      const from = until - days * DAY_MS
      const names = await courseNames(source)
      return (await source.listAnnouncements())
        .filter((announcement) => {
          const posted = Date.parse(announcement.postedAt)
          return posted >= from && posted <= until
        })
        .sort((a, b) => Date.parse(b.postedAt) - Date.parse(a.postedAt))
        .map((announcement) => ({
          id: announcement.id,
          title: announcement.title,
          message: announcement.message,
          author: announcement.author,
          postedAt: announcement.postedAt,
          course: names.get(announcement.courseId) ?? announcement.courseId
        }))
    }
  })
}
