/**
 * Bulk Assignment Selection
 * Mutable selection state that feeds frozen operations to the service
 */

import {
  Application,
  Assignment,
  AssignmentIntent,
  AssignmentSettings,
  DevicePlatform,
  DeviceGroup,
  GroupAssignmentSettings,
  BulkAssignmentOperation,
} from '../types';
import { createBulkAssignmentOperation } from './operation';

export interface SelectionSummary {
  applications: number;
  groups: number;
  totalAssignments: number;
  sharedPlatforms: DevicePlatform[];
}

export interface PartitionedResults {
  completedAssignments: Assignment[];
  failedAssignments: Assignment[];
  cancelledAssignments: Assignment[];
}

type SelectableGroup = Pick<DeviceGroup, 'id' | 'displayName'>;

export class BulkAssignmentSelection {
  private applications = new Map<string, Application>();
  private groups = new Map<string, SelectableGroup>();
  private groupSettings = new Map<string, GroupAssignmentSettings>();

  intent: AssignmentIntent = 'required';
  settings: AssignmentSettings | undefined;

  selectApplication(application: Application): void {
    this.applications.set(application.id, application);
  }

  deselectApplication(applicationId: string): void {
    this.applications.delete(applicationId);
  }

  selectGroup(group: SelectableGroup): GroupAssignmentSettings | undefined {
    this.groups.set(group.id, group);

    const primary = this.getSelectedApplications()[0];
    if (!primary) {
      return undefined;
    }

    const existing = this.groupSettings.get(group.id);
    if (existing) {
      return existing;
    }

    const created: GroupAssignmentSettings = {
      groupId: group.id,
      groupName: group.displayName,
      appType: primary.appType,
      intent: this.intent,
      mode: 'include',
    };
    this.groupSettings.set(group.id, created);
    return created;
  }

  deselectGroup(groupId: string): void {
    this.groups.delete(groupId);
    this.groupSettings.delete(groupId);
  }

  updateGroupSettings(groupId: string, changes: Partial<Omit<GroupAssignmentSettings, 'groupId'>>): void {
    const current = this.groupSettings.get(groupId);
    if (!current) {
      throw new Error(`Group ${groupId} is not selected`);
    }
    this.groupSettings.set(groupId, { ...current, ...changes });
  }

  getSelectedApplications(): Application[] {
    return [...this.applications.values()];
  }

  getSelectedGroups(): SelectableGroup[] {
    return [...this.groups.values()];
  }

  getGroupSettings(groupId: string): GroupAssignmentSettings | undefined {
    return this.groupSettings.get(groupId);
  }

  /**
   * Platforms every selected application supports
   */
  getSharedPlatforms(): DevicePlatform[] {
    const apps = this.getSelectedApplications();
    if (apps.length === 0) {
      return [];
    }
    return apps
      .slice(1)
      .reduce<DevicePlatform[]>(
        (shared, app) => shared.filter((platform) => app.supportedPlatforms.includes(platform)),
        [...apps[0].supportedPlatforms]
      );
  }

  getSummary(): SelectionSummary {
    return {
      applications: this.applications.size,
      groups: this.groups.size,
      totalAssignments: this.applications.size * this.groups.size,
      sharedPlatforms: this.getSharedPlatforms(),
    };
  }

  isReady(): boolean {
    return this.applications.size > 0 && this.groups.size > 0;
  }

  buildOperation(): BulkAssignmentOperation {
    return createBulkAssignmentOperation({
      applications: this.getSelectedApplications(),
      groups: this.getSelectedGroups(),
      intent: this.intent,
      settings: this.settings,
      groupSettings: [...this.groupSettings.values()],
    });
  }

  reset(): void {
    this.applications.clear();
    this.groups.clear();
    this.groupSettings.clear();
    this.intent = 'required';
    this.settings = undefined;
  }
}

export function partitionResults(results: readonly Assignment[]): PartitionedResults {
  return {
    completedAssignments: results.filter((assignment) => assignment.status === 'success'),
    failedAssignments: results.filter((assignment) => assignment.status === 'failed'),
    cancelledAssignments: results.filter((assignment) => assignment.status === 'cancelled'),
  };
}
