import { queryController } from "@interfaces/http/QueryController";
import { requireUser } from "@middleware/auth";
import { Router } from "express";

const router = Router();

router.post("/", requireUser, queryController);

export default router;
