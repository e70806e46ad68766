/**
 * Route53 zone lookup
 * Decides whether a DNS name is a hosted zone or a record set in one
 */

import {
  Route53Client,
  ListHostedZonesCommand,
  ListResourceRecordSetsCommand,
  GetHostedZoneCommand,
  type HostedZone,
  type ResourceRecordSet,
  type RRType,
} from "@aws-sdk/client-route-53";
import type { AwsClientConfig } from "../../types/aws.js";
import type {
  DescribedResource,
  Route53Descriptor,
} from "../../types/resource.js";
import { DescribeError, Route53LookupError } from "../errors.js";
import { createRoute53Client } from "./client.js";
import { toDescribedResource } from "./records.js";

/**
 * Route53 zone lookup options
 */
export interface Route53ZoneLookupOptions extends AwsClientConfig {
  /** Receives progress messages */
  log?: (message: string) => void;
}

/**
 * A record set together with the zone it was found in
 */
export interface ZoneRecord {
  zone: HostedZone;
  record: ResourceRecordSet;
}

/**
 * Position to resume a ListResourceRecordSets listing from
 */
interface RecordSetCursor {
  name: string;
  type?: RRType;
  identifier?: string;
}

/**
 * Ensure a trailing dot and lower-case the name, the way Route53 stores it
 */
export function toFqdn(name: string): string {
  const lower = name.toLowerCase();
  return lower.endsWith(".") ? lower : `${lower}.`;
}

/**
 * True when `zoneName` is `fqdn` itself or one of its parent domains
 */
export function isZoneSuffix(fqdn: string, zoneName: string): boolean {
  const zone = toFqdn(zoneName);
  return fqdn === zone || fqdn.endsWith(`.${zone}`);
}

/**
 * Route53 lookups used while classifying a DNS name
 */
export class Route53ZoneLookup {
  private client: Route53Client;
  private log: (message: string) => void;

  constructor(options: Route53ZoneLookupOptions = {}) {
    this.client = createRoute53Client(options);
    this.log = options.log ?? (() => undefined);
  }

  /**
   * Every hosted zone in the account, following NextMarker across pages
   */
  async *listHostedZones(): AsyncGenerator<HostedZone> {
    let marker: string | undefined;

    do {
      const response = await this.client.send(
        new ListHostedZonesCommand({ Marker: marker })
      );

      for (const zone of response.HostedZones ?? []) {
        yield zone;
      }

      marker = response.IsTruncated ? response.NextMarker : undefined;
    } while (marker);
  }

  /**
   * Every record set in a zone, page by page
   */
  async *listRecordSets(hostedZoneId: string): AsyncGenerator<ResourceRecordSet> {
    let cursor: RecordSetCursor | undefined;

    do {
      const response = await this.client.send(
        new ListResourceRecordSetsCommand({
          HostedZoneId: hostedZoneId,
          StartRecordName: cursor?.name,
          StartRecordType: cursor?.type,
          StartRecordIdentifier: cursor?.identifier,
        })
      );

      for (const record of response.ResourceRecordSets ?? []) {
        yield record;
      }

      cursor =
        response.IsTruncated && response.NextRecordName
          ? {
              name: response.NextRecordName,
              type: response.NextRecordType,
              identifier: response.NextRecordIdentifier,
            }
          : undefined;
    } while (cursor);
  }

  /**
   * Zones whose name is the FQDN itself or a parent domain of it, in listing order
   */
  async findCandidateZones(fqdn: string): Promise<HostedZone[]> {
    const candidates: HostedZone[] = [];

    for await (const zone of this.listHostedZones()) {
      if (zone.Name && isZoneSuffix(fqdn, zone.Name)) {
        candidates.push(zone);
      }
    }

    return candidates;
  }

  /**
   * Lazily walk (zone, record) pairs whose record name equals the FQDN
   */
  async *findRecords(fqdn: string, zones: HostedZone[]): AsyncGenerator<ZoneRecord> {
    for (const zone of zones) {
      if (!zone.Id) {
        continue;
      }

      this.log(`Checking zone ${zone.Name} for record ${fqdn}`);

      for await (const record of this.listRecordSets(zone.Id)) {
        if (record.Name && toFqdn(record.Name) === fqdn) {
          yield { zone, record };
        }
      }
    }
  }

  /**
   * Classify a DNS name as a hosted zone or a record set
   *
   * @returns null when no zone or record matches
   * @throws Route53LookupError when a Route53 call fails
   */
  async resolve(name: string): Promise<Route53Descriptor | null> {
    const fqdn = toFqdn(name);

    try {
      const zones = await this.findCandidateZones(fqdn);

      const exact = zones.find((zone) => zone.Name && toFqdn(zone.Name) === fqdn);
      if (exact?.Id) {
        this.log(`Doing a zone lookup on ${fqdn}`);
        return { type: "route53", subType: "hosted_zone", name: exact.Id };
      }

      for await (const { record } of this.findRecords(fqdn, zones)) {
        return { type: "route53", subType: "record", name, data: record };
      }

      return null;
    } catch (error) {
      throw new Route53LookupError(name, { cause: error });
    }
  }

  /**
   * Full detail of a hosted zone, with its delegation set and VPCs when present
   */
  async describeHostedZone(hostedZoneId: string): Promise<DescribedResource> {
    const response = await this.client.send(
      new GetHostedZoneCommand({ Id: extractHostedZoneId(hostedZoneId) })
    );

    if (!response.HostedZone) {
      throw new DescribeError(`Hosted zone ${hostedZoneId} not found`);
    }

    return toDescribedResource({
      ...response.HostedZone,
      DelegationSet: response.DelegationSet,
      VPCs: response.VPCs,
    });
  }
}

/**
 * Get hosted zone ID from zone object
 * Route53 returns IDs like "/hostedzone/Z123456789ABC"; the API takes "Z123456789ABC"
 */
export function extractHostedZoneId(hostedZoneId: string): string {
  return hostedZoneId.replace("/hostedzone/", "");
}
