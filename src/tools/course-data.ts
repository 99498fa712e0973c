import {readFile} from 'node:fs/promises'
import {z} from 'zod'

const id = z.union([z.string().min(1), z.number().int()]).transform(String)
const nullableNumber = z.number().nullable().default(null)
const nullableString = z.string().nullable().default(null)

export const courseSchema = z.object({
  id,
  name: z.string().default('Unnamed'),
  courseCode: z.string().optional(),
  term: z.string().optional(),
  currentGrade: nullableString,
  currentScore: nullableNumber,
  finalGrade: nullableString,
  finalScore: nullableNumber
})

export const assignmentSchema = z.object({
  id,
  courseId: id,
  name: z.string(),
  dueAt: nullableString,
  pointsPossible: nullableNumber,
  submitted: z.boolean().default(false),
  score: nullableNumber,
  grade: nullableString
})

export const announcementSchema = z.object({
  id,
  courseId: id,
  title: z.string(),
  message: z.string().default(''),
  author: z.string().default('Unknown'),
  postedAt: z.string()
})

export const courseSnapshotSchema = z.object({
  courses: z.array(courseSchema).default([]),
  assignments: z.array(assignmentSchema).default([]),
  announcements: z.array(announcementSchema).default([])
})

export type Course = z.infer<typeof courseSchema>
export type Assignment = z.infer<typeof assignmentSchema>
export type Announcement = z.infer<typeof announcementSchema>
export type CourseSnapshot = z.infer<typeof courseSnapshotSchema>

/** Read side of the learning management system, as the course tools see it. */
export interface CourseDataSource {
  listCourses(): Promise<Course[]>
  listAssignments(courseId?: string): Promise<Assignment[]>
  listAnnouncements(): Promise<Announcement[]>
}

export class SnapshotCourseDataSource implements CourseDataSource {
  constructor(private readonly snapshot: CourseSnapshot) {}

  async listCourses(): Promise<Course[]> {
    return [...this.snapshot.courses]
  }

  async listAssignments(courseId?: string): Promise<Assignment[]> {
    const {assignments} = this.snapshot
    return courseId === undefined ? [...assignments] : assignments.filter((item) => item.courseId === courseId)
  }

  async listAnnouncements(): Promise<Announcement[]> {
    return [...this.snapshot.announcements]
  }
}

export async function loadCourseSnapshot(path: string): Promise<CourseSnapshot> {
  let raw: string
  try {
    raw = await readFile(path, 'utf8')
  } catch (error) {
    throw new Error(`Cannot read course data file '${path}'. Run 'coursemate init' or set COURSEMATE_DATA_FILE.`, {
      cause: error
    })
  }

  let json: unknown
  try {
    json = JSON.parse(raw)
  } catch (error) {
    throw new Error(`Course data file '${path}' is not valid JSON`, {cause: error})
  }

  const parsed = courseSnapshotSchema.safeParse(json)
  if (!parsed.success) {
    const first = parsed.error.issues[0]
    const where = first ? `${first.path.join('.')}: ${first.message}` : 'unknown issue'
    throw new Error(`Course data file '${path}' is invalid (${where})`)
  }

  return parsed.data
}

/** Loads the snapshot on first use; a failed load is retried on the next call. */
export class FileCourseDataSource implements CourseDataSource {
  private loading?: Promise<SnapshotCourseDataSource>

  constructor(readonly path: string) {}

  async listCourses(): Promise<Course[]> {
    return (await this.source()).listCourses()
  }

  async listAssignments(courseId?: string): Promise<Assignment[]> {
    return (await this.source()).listAssignments(courseId)
  }

  async listAnnouncements(): Promise<Announcement[]> {
    return (await this.source()).listAnnouncements()
  }

  private source(): Promise<SnapshotCourseDataSource> {
    if (!this.loading) {
      const loading = loadCourseSnapshot(this.path).then((snapshot) => new SnapshotCourseDataSource(snapshot))
      this.loading = loading
      void loading.catch(() => {
        if (this.loading === loading) this.loading = undefined
      })
    }
    return this.loading
  }
}
