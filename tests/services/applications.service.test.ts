import { beforeEach, describe, expect, it } from "vitest";
import {
  DuplicateApplicationError,
  ForbiddenError,
  NotFoundError,
  ValidationError,
} from "../../src/domain/errors";
import type { JobRecord, UserRecord } from "../../src/domain/types";
import { createHarness, seedJob, seedUser, validApplication, type Harness } from "../support/fakes";

describe("ApplicationsService", () => {
  let h: Harness;
  let employer: UserRecord;
  let otherEmployer: UserRecord;
  let seeker: UserRecord;
  let otherSeeker: UserRecord;
  let admin: UserRecord;
  let job: JobRecord;

  beforeEach(async () => {
    h = createHarness();
    employer = await seedUser(h.store, "employer", { firstName: "Grace", email: "grace@example.test" });
    otherEmployer = await seedUser(h.store, "employer");
    seeker = await seedUser(h.store, "seeker", { firstName: "Ada", lastName: "Lovelace", email: "ada@example.test" });
    otherSeeker = await seedUser(h.store, "seeker");
    admin = await seedUser(h.store, "admin");
    job = await seedJob(h.store, employer, { title: "Backend Engineer" });
  });

  describe("apply", () => {
    it("records a pending application and notifies both sides", async () => {
      const application = await h.services.applications.apply(seeker, job.id, validApplication);

      expect(application).toMatchObject({
        status: "pending",
        seekerId: seeker.id,
        jobId: job.id,
        coverLetter: validApplication.coverLetter,
        resumeUrl: validApplication.resumeUrl,
      });
      expect(h.notifier.sent).toEqual([
        {
          kind: "application-submitted",
          to: "ada@example.test",
          data: { firstName: "Ada", jobTitle: "Backend Engineer", company: "Acme" },
        },
        {
          kind: "application-received",
          to: "grace@example.test",
          data: { firstName: "Grace", jobTitle: "Backend Engineer", applicantName: "Ada Lovelace" },
        },
      ]);
    });

    it("is for seekers only", async () => {
      await expect(h.services.applications.apply(employer, job.id, validApplication)).rejects.toThrow(
        new ForbiddenError("Only job seekers can apply to jobs")
      );
      await expect(h.services.applications.apply(admin, job.id, validApplication)).rejects.toBeInstanceOf(
        ForbiddenError
      );
    });

    it("needs an approved job", async () => {
      const pending = await seedJob(h.store, employer, { status: "pending" });

      await expect(h.services.applications.apply(seeker, 999, validApplication)).rejects.toBeInstanceOf(NotFoundError);
      await expect(h.services.applications.apply(seeker, pending.id, validApplication)).rejects.toThrow(
        new ValidationError("This job is not available for applications")
      );
    });

    it("allows one application per seeker and job", async () => {
      await h.services.applications.apply(seeker, job.id, validApplication);

      const again = h.services.applications.apply(seeker, job.id, validApplication);
      await expect(again).rejects.toBeInstanceOf(DuplicateApplicationError);
      await expect(again).rejects.toMatchObject({ status: 409, code: "DUPLICATE_APPLICATION" });
      await expect(h.services.applications.apply(otherSeeker, job.id, validApplication)).resolves.toBeDefined();
    });

    it("reports the duplicate before looking at the body", async () => {
      await h.services.applications.apply(seeker, job.id, validApplication);
      await expect(h.services.applications.apply(seeker, job.id, {})).rejects.toBeInstanceOf(
        DuplicateApplicationError
      );
    });

    it("lets exactly one of two simultaneous submissions through", async () => {
      const results = await Promise.allSettled([
        h.services.applications.apply(seeker, job.id, validApplication),
        h.services.applications.apply(seeker, job.id, validApplication),
      ]);

      expect(results.map((r) => r.status).sort()).toEqual(["fulfilled", "rejected"]);
      const rejected = results.find((r) => r.status === "rejected");
      expect(rejected?.status === "rejected" && rejected.reason).toBeInstanceOf(DuplicateApplicationError);
      expect(h.store.applicationRows.rows.size).toBe(1);
      expect(h.notifier.ofKind("application-submitted")).toHaveLength(1);
    });

    it("needs a cover letter and a resume", async () => {
      await expect(
        h.services.applications.apply(seeker, job.id, { coverLetter: validApplication.coverLetter })
      ).rejects.toThrow(new ValidationError("Cover letter and resume URL are required"));
      expect(h.store.applicationRows.rows.size).toBe(0);
      expect(h.notifier.sent).toEqual([]);
    });

    it("keeps the application when mail delivery fails", async () => {
      h.notifier.failWith = new Error("mail down");

      await h.services.applications.apply(seeker, job.id, validApplication);
      expect(h.store.applicationRows.rows.size).toBe(1);
    });
  });

  describe("listMine", () => {
    it("returns the seeker's applications with their jobs", async () => {
      const second = await seedJob(h.store, otherEmployer, { title: "Data Engineer" });
      await h.services.applications.apply(seeker, job.id, validApplication);
      await h.services.applications.apply(seeker, second.id, validApplication);
      await h.services.applications.apply(otherSeeker, job.id, validApplication);

      const mine = await h.services.applications.listMine(seeker);
      expect(mine.map((a) => a.job?.title)).toEqual(["Data Engineer", "Backend Engineer"]);
      expect(mine[0]).not.toHaveProperty("seeker");
    });

    it("is for seekers only", async () => {
      await expect(h.services.applications.listMine(employer)).rejects.toThrow(
        "Only job seekers can view their applications"
      );
    });
  });

  describe("listForJob", () => {
    it("shows the owner each applicant", async () => {
      await h.services.applications.apply(seeker, job.id, validApplication);

      const list = await h.services.applications.listForJob(employer, job.id);
      expect(list).toHaveLength(1);
      expect(list[0].seeker).toMatchObject({ id: seeker.id, firstName: "Ada", lastName: "Lovelace" });
      expect(list[0]).not.toHaveProperty("job");
      await expect(h.services.applications.listForJob(admin, job.id)).resolves.toHaveLength(1);
    });

    it("keeps other employers and seekers out", async () => {
      await expect(h.services.applications.listForJob(otherEmployer, job.id)).rejects.toThrow(
        new ForbiddenError("You can only view applications for your own jobs")
      );
      await expect(h.services.applications.listForJob(seeker, job.id)).rejects.toThrow(
        new ForbiddenError("Insufficient permissions")
      );
    });

    it("answers forbidden before not found for the wrong role", async () => {
      await expect(h.services.applications.listForJob(seeker, 999)).rejects.toBeInstanceOf(ForbiddenError);
      await expect(h.services.applications.listForJob(employer, 999)).rejects.toBeInstanceOf(NotFoundError);
    });
  });

  describe("get", () => {
    it("projects the application for the caller", async () => {
      const { id } = await h.services.applications.apply(seeker, job.id, validApplication);

      const forSeeker = await h.services.applications.get(seeker, id);
      expect(forSeeker.job).toMatchObject({ id: job.id, title: "Backend Engineer" });
      expect(forSeeker).not.toHaveProperty("seeker");

      for (const actor of [employer, admin]) {
        const view = await h.services.applications.get(actor, id);
        expect(view.seeker).toMatchObject({ id: seeker.id });
        expect(view).not.toHaveProperty("job");
      }
    });

    it("refuses strangers", async () => {
      const { id } = await h.services.applications.apply(seeker, job.id, validApplication);

      await expect(h.services.applications.get(otherSeeker, id)).rejects.toThrow(
        new ForbiddenError("You can only view your own applications")
      );
      await expect(h.services.applications.get(otherEmployer, id)).rejects.toBeInstanceOf(ForbiddenError);
    });

    it("reports a missing application", async () => {
      await expect(h.services.applications.get(seeker, 999)).rejects.toThrow(
        new NotFoundError("Application not found")
      );
    });
  });

  describe("updateStatus", () => {
    it("moves freely between statuses for the job's owner", async () => {
      const { id } = await h.services.applications.apply(seeker, job.id, validApplication);

      expect((await h.services.applications.updateStatus(employer, id, { status: "interview" })).status).toBe(
        "interview"
      );
      expect((await h.services.applications.updateStatus(admin, id, { status: "pending" })).status).toBe("pending");
      expect((await h.services.applications.updateStatus(employer, id, { status: "rejected" })).status).toBe(
        "rejected"
      );
    });

    it("never lets the seeker change it", async () => {
      const { id } = await h.services.applications.apply(seeker, job.id, validApplication);

      await expect(
        h.services.applications.updateStatus(seeker, id, { status: "approved" })
      ).rejects.toBeInstanceOf(ForbiddenError);
      await expect(
        h.services.applications.updateStatus(otherEmployer, id, { status: "approved" })
      ).rejects.toThrow(new ForbiddenError("You can only update applications for your own jobs"));
      expect((await h.store.applications.findById(id))?.status).toBe("pending");
    });

    it("rejects unknown statuses and applications", async () => {
      const { id } = await h.services.applications.apply(seeker, job.id, validApplication);

      await expect(h.services.applications.updateStatus(employer, id, { status: "hired" })).rejects.toThrow(
        new ValidationError("Invalid status")
      );
      await expect(
        h.services.applications.updateStatus(employer, 999, { status: "approved" })
      ).rejects.toBeInstanceOf(NotFoundError);
    });
  });
});
