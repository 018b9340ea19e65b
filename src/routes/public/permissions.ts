import { permissionsController } from "@interfaces/http/PermissionsController";
import { requireUser } from "@middleware/auth";
import { Router } from "express";

const router = Router();

router.get("/", requireUser, permissionsController);

export default router;
