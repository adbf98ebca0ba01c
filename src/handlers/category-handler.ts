import type { Request, Response } from "express";
import { z } from "zod";
import { parseBody, parseId } from "../http/request.js";
import { respondWithError, success, writeJSON } from "../http/response.js";
import { categoryJson } from "../http/serializers.js";
import type { CategoryService } from "../services/category-service.js";
import type { Logger } from "../utils/logger.js";

const createCategorySchema = z.object({
  name: z.string().min(1, "must not be empty"),
  description: z.string().default(""),
});

// "", null and a missing key all mean "not provided"
const providedText = z
  .string()
  .nullish()
  .transform((value) => (value ? value : undefined));

const updateCategorySchema = z.object({
  name: providedText,
  description: providedText,
});

const NOT_FOUND = "Category not found";

export class CategoryHandler {
  constructor(
    private readonly service: CategoryService,
    private readonly logger: Logger
  ) {}

  getCategories = async (_req: Request, res: Response): Promise<void> => {
    try {
      const categories = await this.service.getAll();
      writeJSON(res, 200, success("Categories retrieved successfully", categories.map(categoryJson)));
    } catch (error) {
      respondWithError(res, error, { notFound: NOT_FOUND, failure: "Failed to fetch categories" }, this.logger);
    }
  };

  createCategory = async (req: Request, res: Response): Promise<void> => {
    try {
      const input = parseBody(createCategorySchema, req.body);
      const category = await this.service.create(input);
      writeJSON(res, 201, success("Category created successfully", categoryJson(category)));
    } catch (error) {
      respondWithError(res, error, { notFound: NOT_FOUND, failure: "Failed to save category" }, this.logger);
    }
  };

  getCategoryById = async (req: Request, res: Response): Promise<void> => {
    try {
      const id = parseId(req.params.id, "Category");
      const category = await this.service.getById(id);
      writeJSON(res, 200, success("Category retrieved successfully", categoryJson(category)));
    } catch (error) {
      respondWithError(res, error, { notFound: NOT_FOUND, failure: "Failed to fetch category" }, this.logger);
    }
  };

  updateCategory = async (req: Request, res: Response): Promise<void> => {
    try {
      const id = parseId(req.params.id, "Category");
      const patch = parseBody(updateCategorySchema, req.body);
      const category = await this.service.update(id, patch);
      writeJSON(res, 200, success("Category updated successfully", categoryJson(category)));
    } catch (error) {
      respondWithError(res, error, { notFound: NOT_FOUND, failure: "Failed to update category" }, this.logger);
    }
  };

  deleteCategory = async (req: Request, res: Response): Promise<void> => {
    try {
      const id = parseId(req.params.id, "Category");
      await this.service.delete(id);
      writeJSON(res, 200, success("Category deleted successfully"));
    } catch (error) {
      respondWithError(res, error, { notFound: NOT_FOUND, failure: "Failed to delete category" }, this.logger);
    }
  };
}
