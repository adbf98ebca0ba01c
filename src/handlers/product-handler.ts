import type { Request, Response } from "express";
import { z } from "zod";
import { parseBody, parseId } from "../http/request.js";
import { respondWithError, success, writeJSON } from "../http/response.js";
import { productJson } from "../http/serializers.js";
import type { ProductService } from "../services/product-service.js";
import type { Logger } from "../utils/logger.js";

const name = z.string().min(1, "must not be empty");
const amount = z.number().int().min(0);
const categoryId = z.number().int().positive();

// An empty or null name keeps the stored one
const providedText = z
  .string()
  .nullish()
  .transform((value) => (value ? value : undefined));

const optional = <T extends z.ZodTypeAny>(field: T) => field.nullish().transform((value) => value ?? undefined);

const createProductSchema = z
  .object({
    name,
    price: amount,
    stock: amount.default(0),
    category_id: categoryId,
  })
  .transform(({ category_id, ...rest }) => ({ ...rest, categoryId: category_id }));

const updateProductSchema = z
  .object({
    name: providedText,
    price: optional(amount),
    stock: optional(amount),
    category_id: optional(categoryId),
  })
  .transform(({ category_id, ...rest }) => ({ ...rest, categoryId: category_id }));

const NOT_FOUND = "Product not found";

export class ProductHandler {
  constructor(
    private readonly service: ProductService,
    private readonly logger: Logger
  ) {}

  getProducts = async (_req: Request, res: Response): Promise<void> => {
    try {
      const products = await this.service.getAll();
      writeJSON(res, 200, success("Products retrieved successfully", products.map(productJson)));
    } catch (error) {
      respondWithError(res, error, { notFound: NOT_FOUND, failure: "Failed to fetch products" }, this.logger);
    }
  };

  createProduct = async (req: Request, res: Response): Promise<void> => {
    try {
      const input = parseBody(createProductSchema, req.body);
      const product = await this.service.create(input);
      writeJSON(res, 201, success("Product created successfully", productJson(product)));
    } catch (error) {
      respondWithError(res, error, { notFound: NOT_FOUND, failure: "Failed to save product" }, this.logger);
    }
  };

  getProductById = async (req: Request, res: Response): Promise<void> => {
    try {
      const id = parseId(req.params.id, "Product");
      const product = await this.service.getById(id);
      writeJSON(res, 200, success("Product retrieved successfully", productJson(product)));
    } catch (error) {
      respondWithError(res, error, { notFound: NOT_FOUND, failure: "Failed to fetch product" }, this.logger);
    }
  };

  updateProduct = async (req: Request, res: Response): Promise<void> => {
    try {
      const id = parseId(req.params.id, "Product");
      const patch = parseBody(updateProductSchema, req.body);
      const product = await this.service.update(id, patch);
      writeJSON(res, 200, success("Product updated successfully", productJson(product)));
    } catch (error) {
      respondWithError(res, error, { notFound: NOT_FOUND, failure: "Failed to update product" }, this.logger);
    }
  };

  deleteProduct = async (req: Request, res: Response): Promise<void> => {
    try {
      const id = parseId(req.params.id, "Product");
      await this.service.delete(id);
      writeJSON(res, 200, success("Product deleted successfully"));
    } catch (error) {
      respondWithError(res, error, { notFound: NOT_FOUND, failure: "Failed to delete product" }, this.logger);
    }
  };
}
