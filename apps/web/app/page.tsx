import { redirect } from "next/navigation";
import { getSetupStatus } from "@rigtrack/core/setup";
import { getSession } from "@/lib/auth";

export default async function HomePage() {
  const status = await getSetupStatus();
  if (!status.completed) {
    redirect("/setup");
  }

  const session = await getSession();
  if (!session) {
    redirect("/login");
  }

  redirect("/items");
}
