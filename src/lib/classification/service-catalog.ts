/**
 * Service catalog: the categories and request types tickets are sorted into.
 */

import fs from "fs"
import { z } from "zod"
import { PrerequisiteError } from "../errors.js"

export const RequestTypeSchema = z.object({
  name: z.string().min(1),
  description: z.string().default(""),
})

export const ServiceCategorySchema = z.object({
  name: z.string().min(1),
  request_types: z.array(RequestTypeSchema).min(1),
})

export const ServiceCatalogFileSchema = z.object({
  "Service Categories": z.array(ServiceCategorySchema).min(1),
})

export type RequestType = z.infer<typeof RequestTypeSchema>
export type ServiceCategory = z.infer<typeof ServiceCategorySchema>

export class ServiceCatalog {
  readonly categories: ServiceCategory[]

  constructor(categories: ServiceCategory[]) {
    this.categories = categories
  }

  /**
   * Build a catalog from parsed JSON.
   *
   * @throws PrerequisiteError if the structure is invalid
   */
  static fromJson(data: unknown, source = "service catalog"): ServiceCatalog {
    const result = ServiceCatalogFileSchema.safeParse(data)
    if (!result.success) {
      const problems = result.error.issues.map(
        (issue) => `${issue.path.join(".")}: ${issue.message}`
      )
      throw new PrerequisiteError(`Invalid ${source}: ${problems.join("; ")}`)
    }
    return new ServiceCatalog(result.data["Service Categories"])
  }

  /**
   * Load the catalog file.
   *
   * @throws PrerequisiteError if the file is missing or not valid JSON
   */
  static load(filePath: string): ServiceCatalog {
    if (!fs.existsSync(filePath)) {
      throw new PrerequisiteError(`Service categories file not found: ${filePath}`)
    }
    let data: unknown
    try {
      data = JSON.parse(fs.readFileSync(filePath, "utf-8"))
    } catch {
      throw new PrerequisiteError(`Invalid JSON format in service categories file: ${filePath}`)
    }
    return ServiceCatalog.fromJson(data, `service categories file ${filePath}`)
  }

  get categoryNames(): string[] {
    return this.categories.map((category) => category.name)
  }

  findCategory(name: string): ServiceCategory | undefined {
    return this.categories.find((category) => category.name === name)
  }

  requestTypeNames(categoryName: string): string[] {
    return this.findCategory(categoryName)?.request_types.map((type) => type.name) ?? []
  }
}
