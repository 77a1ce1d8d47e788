"use client";

import { useState } from "react";
import Link from "next/link";
import { usePathname } from "next/navigation";
import { Button, Separator, cn } from "@rigtrack/ui";
import { hasPermission } from "@rigtrack/shared";
import type { UserRole } from "@rigtrack/shared";
import {
  Boxes,
  Package,
  MapPin,
  CalendarDays,
  Users,
  Settings,
  History,
  KeyRound,
  LogOut,
  Menu,
  X,
} from "lucide-react";

interface DashboardShellProps {
  children: React.ReactNode;
  user: {
    id: string;
    username: string;
    role: UserRole;
    permissions: string[];
  };
  companyName: string;
}

const mainNavItems = [
  { label: "Items", href: "/items", icon: Package, permission: "inventory:items:read" },
  { label: "Locations", href: "/locations", icon: MapPin, permission: "inventory:locations:read" },
  {
    label: "Productions",
    href: "/productions",
    icon: CalendarDays,
    permission: "productions:productions:read",
  },
];

const adminNavItems = [
  { label: "Users", href: "/admin/users", icon: Users },
  { label: "Company", href: "/admin/settings", icon: Settings },
  { label: "Activity", href: "/admin/activity", icon: History },
];

function NavLink({
  href,
  label,
  icon: Icon,
  active,
  onNavigate,
}: {
  href: string;
  label: string;
  icon: typeof Package;
  active: boolean;
  onNavigate: () => void;
}) {
  return (
    <Link
      href={href}
      className={cn(
        "flex items-center gap-3 px-3 py-2 rounded-md text-sm font-medium transition-colors",
        active
          ? "bg-primary text-primary-foreground"
          : "text-muted-foreground hover:bg-muted hover:text-foreground"
      )}
      onClick={onNavigate}
    >
      <Icon className="h-4 w-4" />
      {label}
    </Link>
  );
}

export function DashboardShell({ children, user, companyName }: DashboardShellProps) {
  const pathname = usePathname();
  const [sidebarOpen, setSidebarOpen] = useState(false);
  const [signingOut, setSigningOut] = useState(false);

  async function signOut() {
    setSigningOut(true);
    try {
      await fetch("/api/auth/logout", { method: "POST" });
    } catch (error) {
      console.error("Sign-out failed:", error);
    } finally {
      window.location.href = "/login";
    }
  }

  const closeSidebar = () => setSidebarOpen(false);
  const title = companyName || "RigTrack";

  return (
    <div className="min-h-screen bg-background">
      {/* Mobile sidebar overlay */}
      {sidebarOpen && (
        <div
          className="fixed inset-0 bg-black/50 z-40 lg:hidden"
          onClick={closeSidebar}
        />
      )}

      <aside
        className={cn(
          "fixed inset-y-0 left-0 z-50 w-64 bg-card border-r transform transition-transform duration-200 ease-in-out lg:translate-x-0",
          sidebarOpen ? "translate-x-0" : "-translate-x-full"
        )}
      >
        <div className="flex flex-col h-full">
          <div className="flex items-center gap-2 px-4 h-16 border-b">
            <Boxes className="h-6 w-6 text-primary" />
            <span className="font-semibold text-lg truncate">{title}</span>
            <Button
              variant="ghost"
              size="icon"
              className="ml-auto lg:hidden"
              onClick={closeSidebar}
            >
              <X className="h-4 w-4" />
            </Button>
          </div>

          <nav className="flex-1 overflow-y-auto py-4 px-3 space-y-1">
            {mainNavItems
              .filter((item) => hasPermission(user.permissions, item.permission))
              .map((item) => (
                <NavLink
                  key={item.href}
                  {...item}
                  active={pathname.startsWith(item.href)}
                  onNavigate={closeSidebar}
                />
              ))}

            {user.role === "admin" && (
              <>
                <Separator className="my-3" />
                <p className="px-3 text-xs font-semibold text-muted-foreground uppercase tracking-wider mb-2">
                  Admin
                </p>
                {adminNavItems.map((item) => (
                  <NavLink
                    key={item.href}
                    {...item}
                    active={pathname === item.href}
                    onNavigate={closeSidebar}
                  />
                ))}
              </>
            )}
          </nav>

          <div className="border-t p-3 space-y-1">
            <div className="px-3 py-2">
              <div className="text-sm font-medium truncate">{user.username}</div>
              <div className="text-xs text-muted-foreground capitalize">{user.role}</div>
            </div>
            <NavLink
              href="/account"
              label="Change password"
              icon={KeyRound}
              active={pathname === "/account"}
              onNavigate={closeSidebar}
            />
            <button
              onClick={() => void signOut()}
              disabled={signingOut}
              className="flex w-full items-center gap-3 px-3 py-2 rounded-md text-sm font-medium text-destructive hover:bg-muted transition-colors disabled:opacity-50"
            >
              <LogOut className="h-4 w-4" />
              Sign out
            </button>
          </div>
        </div>
      </aside>

      <div className="lg:pl-64">
        {/* Top bar (mobile) */}
        <header className="sticky top-0 z-30 flex h-16 items-center gap-4 border-b bg-background px-4 lg:hidden">
          <Button variant="ghost" size="icon" onClick={() => setSidebarOpen(true)}>
            <Menu className="h-5 w-5" />
          </Button>
          <div className="font-semibold">{title}</div>
        </header>

        <main className="p-4 md:p-6 lg:p-8">{children}</main>
      </div>
    </div>
  );
}
