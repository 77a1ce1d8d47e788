import { router, protectedProcedure, adminProcedure } from "../../trpc/procedures";
import { createAuditLog } from "../../audit/index";
import { updateCompanySchema } from "@rigtrack/shared";
import { getCompanyProfile, saveCompanyProfile } from "./company";

// ============================================
// Settings Router — company name and logo
// Logo uploads go through POST /api/settings/logo (multipart)
// ============================================

export const settingsRouter = router({
  /** Company name and whether a logo is stored. Any signed-in user. */
  company: protectedProcedure.query(async ({ ctx }) => {
    const profile = await getCompanyProfile(ctx.db);
    return {
      companyName: profile?.companyName ?? "",
      hasLogo: Boolean(profile?.logoData),
      logoFileName: profile?.logoFileName ?? null,
      updatedAt: profile?.updatedAt ?? null,
    };
  }),

  updateCompany: adminProcedure
    .input(updateCompanySchema)
    .mutation(async ({ input, ctx }) => {
      const before = await getCompanyProfile(ctx.db);
      const profile = await saveCompanyProfile(
        { companyName: input.companyName },
        ctx.db
      );

      await createAuditLog(
        {
          userId: ctx.session.user.id,
          action: "settings:company_updated",
          resourceType: "company_profile",
          resourceId: String(profile.id),
          changes: {
            before: { companyName: before?.companyName ?? "" },
            after: { companyName: profile.companyName },
          },
          ipAddress: ctx.ipAddress,
        },
        ctx.db
      );

      return { companyName: profile.companyName, updatedAt: profile.updatedAt };
    }),

  removeLogo: adminProcedure.mutation(async ({ ctx }) => {
    const profile = await saveCompanyProfile({ logo: null }, ctx.db);

    await createAuditLog(
      {
        userId: ctx.session.user.id,
        action: "settings:logo_removed",
        resourceType: "company_profile",
        resourceId: String(profile.id),
        ipAddress: ctx.ipAddress,
      },
      ctx.db
    );

    return { success: true };
  }),
});
