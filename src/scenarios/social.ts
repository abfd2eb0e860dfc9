import { connectedComponents } from "../algorithms/components.js";
import { shortestPath } from "../algorithms/paths.js";
import { bfsDistances } from "../algorithms/traversal.js";
import { Graph } from "../graph/model.js";
import type { AttributeValue } from "../graph/types.js";

export type Profile = Readonly<Record<string, AttributeValue>>;

export interface Separation {
  readonly degrees: number;
  readonly path: string[];
}

export interface FriendSuggestion {
  readonly user: string;
  readonly mutualCount: number;
}

export interface Influencer {
  readonly user: string;
  readonly connections: number;
}

export interface NetworkSummary {
  readonly users: number;
  readonly friendships: number;
  readonly averageFriends: number;
  readonly groups: number;
  readonly isConnected: boolean;
  /** Mean separation over every ordered pair; `null` unless the network is connected with two users or more. */
  readonly averageSeparation: number | null;
}

/** Friendship network over an undirected graph keyed by user name. */
export class SocialNetwork {
  readonly graph = new Graph<string>({ directed: false, name: "social" });
  private readonly profiles = new Map<string, Profile>();

  addUser(user: string, profile: Profile = {}): boolean {
    if (!this.graph.addNode(user)) {
      return false;
    }
    this.profiles.set(user, profile);
    return true;
  }

  /** Missing users are created with an empty profile. */
  befriend(left: string, right: string): boolean {
    this.addUser(left);
    this.addUser(right);
    return this.graph.addEdge(left, right);
  }

  unfriend(left: string, right: string): boolean {
    return this.graph.removeEdge(left, right);
  }

  profile(user: string): Profile | undefined {
    return this.profiles.get(user);
  }

  friends(user: string): string[] {
    return this.graph.neighbors(user);
  }

  /** Fewest introductions linking two users, or `null` when they are not connected. */
  degreesOfSeparation(from: string, to: string): Separation | null {
    if (!this.graph.hasNode(from) || !this.graph.hasNode(to)) {
      return null;
    }
    const path = shortestPath(this.graph, from, to);
    return path ? { degrees: path.length - 1, path } : null;
  }

  /** Friends shared by both users, in `left`'s friend order. */
  mutualFriends(left: string, right: string): string[] {
    const other = new Set(this.friends(right));
    return this.friends(left).filter((friend) => other.has(friend));
  }

  /**
   * Friends of friends who are not yet friends, ranked by how many friends
   * they share with `user`. Ties keep discovery order.
   */
  suggestFriends(user: string, limit = 5): FriendSuggestion[] {
    const current = new Set(this.friends(user));
    const counts = new Map<string, number>();
    for (const friend of current) {
      for (const candidate of this.friends(friend)) {
        if (candidate !== user && !current.has(candidate)) {
          counts.set(candidate, (counts.get(candidate) ?? 0) + 1);
        }
      }
    }
    return Array.from(counts, ([candidate, mutualCount]) => ({ user: candidate, mutualCount }))
      .sort((left, right) => right.mutualCount - left.mutualCount)
      .slice(0, limit);
  }

  /** Users ranked by friend count; ties keep insertion order. */
  influencers(limit = 5): Influencer[] {
    return this.graph
      .nodes()
      .map((user) => ({ user, connections: this.friends(user).length }))
      .sort((left, right) => right.connections - left.connections)
      .slice(0, limit);
  }

  /** Connected friend groups, members sorted by name. */
  friendGroups(): string[][] {
    return connectedComponents(this.graph).map((group) => [...group].sort());
  }

  /** Share of the possible friendships among `user`'s friends that exist; 0 below two friends. */
  clusteringCoefficient(user: string): number {
    const friends = this.friends(user);
    if (friends.length < 2) {
      return 0;
    }
    let links = 0;
    for (let i = 0; i < friends.length; i += 1) {
      for (let j = i + 1; j < friends.length; j += 1) {
        if (this.graph.hasEdge(friends[i], friends[j])) {
          links += 1;
        }
      }
    }
    return links / ((friends.length * (friends.length - 1)) / 2);
  }

  summary(): NetworkSummary {
    const users = this.graph.nodeCount;
    const friendships = this.graph.edgeCount;
    const groups = connectedComponents(this.graph).length;
    const isConnected = groups <= 1;

    let averageSeparation: number | null = null;
    if (isConnected && users > 1) {
      let total = 0;
      let pairs = 0;
      for (const user of this.graph.nodes()) {
        for (const [other, distance] of bfsDistances(this.graph, user)) {
          if (other !== user) {
            total += distance;
            pairs += 1;
          }
        }
      }
      averageSeparation = total / pairs;
    }

    return {
      users,
      friendships,
      averageFriends: users === 0 ? 0 : (2 * friendships) / users,
      groups,
      isConnected,
      averageSeparation,
    };
  }
}
