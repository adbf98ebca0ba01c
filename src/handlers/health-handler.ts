import type { Request, Response } from "express";
import { success, writeJSON } from "../http/response.js";

export function health(_req: Request, res: Response): void {
  writeJSON(res, 200, success("API Running"));
}
