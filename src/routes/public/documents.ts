import {
  addDocumentController,
  deleteDocumentController,
  listDocumentsController,
} from "@interfaces/http/DocumentController";
import { requireUser } from "@middleware/auth";
import { Router } from "express";

const router = Router();

router.post("/", addDocumentController);
router.get("/", requireUser, listDocumentsController);
router.delete("/:id", deleteDocumentController);

export default router;
