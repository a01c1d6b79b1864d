import { z } from "zod";
import { aws } from "./aws.js";
import { fromShell, fromShellVoid, parseJson, type CallResult } from "./errors.js";
import { ResourceRecordSetSchema, type HostedZone, type ResourceRecordSet } from "../reconciler/types.js";

const HostedZoneSchema = z.object({ Id: z.string(), Name: z.string() });

/** "/hostedzone/Z123" and "Z123" name the same zone. */
export function normalizeZoneId(id: string): string {
  return id.replace(/^\/hostedzone\//, "");
}

function looksLikeZoneId(zone: string): boolean {
  return zone.startsWith("/hostedzone/") || /^Z[A-Z0-9]+$/.test(zone);
}

function toHostedZone(zone: z.infer<typeof HostedZoneSchema>): HostedZone {
  return { zoneId: normalizeZoneId(zone.Id), name: zone.Name };
}

/**
 * Resolve a hosted zone from its id or its domain name.
 * Route53 stores names with a trailing dot, so "example.com" matches "example.com.".
 */
export async function findHostedZone(zone: string, awsProfile: string, awsRegion: string): Promise<CallResult<HostedZone>> {
  if (looksLikeZoneId(zone)) {
    const res = await aws(["route53", "get-hosted-zone", "--id", normalizeZoneId(zone)], awsProfile, awsRegion);
    return fromShell(res, parseJson(z.object({ HostedZone: HostedZoneSchema }).transform(r => toHostedZone(r.HostedZone))));
  }

  const res = await aws(["route53", "list-hosted-zones"], awsProfile, awsRegion);
  const zones = fromShell(res, parseJson(z.object({ HostedZones: z.array(HostedZoneSchema) }).transform(r => r.HostedZones)));
  if (zones.status !== "succeeded") return zones;

  const normalizedDomain = zone.endsWith(".") ? zone : `${zone}.`;
  const match = zones.value.find(hz => hz.Name === normalizedDomain);
  return match ? { status: "succeeded", value: toHostedZone(match) } : { status: "not-found" };
}

export async function listRecordSets(zoneId: string, awsProfile: string, awsRegion: string): Promise<CallResult<ResourceRecordSet[]>> {
  const res = await aws(["route53", "list-resource-record-sets", "--hosted-zone-id", zoneId], awsProfile, awsRegion);
  return fromShell(res, parseJson(z.object({ ResourceRecordSets: z.array(ResourceRecordSetSchema) }).transform(r => r.ResourceRecordSets)));
}

/**
 * Route53 deletes a record only when the change repeats the record set exactly as listed.
 */
export async function deleteRecordSet(zoneId: string, recordSet: ResourceRecordSet, awsProfile: string, awsRegion: string): Promise<CallResult> {
  const changeBatch = JSON.stringify({
    Changes: [{ Action: "DELETE", ResourceRecordSet: recordSet }],
  });
  const res = await aws(
    ["route53", "change-resource-record-sets", "--hosted-zone-id", zoneId, "--change-batch", changeBatch],
    awsProfile,
    awsRegion
  );
  // Route53 reports a record that is already gone as InvalidChangeBatch "not found"
  return fromShellVoid(res);
}

export async function deleteHostedZone(zoneId: string, awsProfile: string, awsRegion: string): Promise<CallResult> {
  return fromShellVoid(await aws(["route53", "delete-hosted-zone", "--id", zoneId], awsProfile, awsRegion));
}
